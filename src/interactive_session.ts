import path from 'path';
import { createInterface, Interface } from 'readline';
import { Readable, Writable } from 'stream';
import { Registry } from './core/registry';

/**
 * 🧭 INTERACTIVE SESSION
 *
 * Default mode when wordforge runs without a command: pick a type, enter seeds,
 * set options, choose provider and model, confirm. Produces a plan; the caller
 * runs the generation.
 */

export interface SessionStreams {
    input: Readable;
    output: Writable;
}

export interface SessionDefaults {
    targetLength: number;
    append: boolean;
    outputPathFor: (filename: string) => string;
}

export interface GenerationPlan {
    wordlistType: string;
    seeds: string[];
    targetLength: number;
    extraInstructions?: string;
    outputPath: string;
    append: boolean;
    providerId: string;
    model: string;
}

const YES = ['y', 'yes'];
const NO = ['n', 'no'];

export class InteractiveSession {
    private readonly rl: Interface;
    private readonly lines: AsyncIterableIterator<string>;

    constructor(
        private readonly registry: Registry,
        private readonly streams: SessionStreams,
        private readonly defaults: SessionDefaults
    ) {
        this.rl = createInterface({ input: streams.input, terminal: false });
        // Iterating from the start buffers lines that arrive before they are asked for
        this.lines = this.rl[Symbol.asyncIterator]();
    }

    /** Walks through every step. Resolves undefined when the user backs out or input ends. */
    async run(): Promise<GenerationPlan | undefined> {
        try {
            return await this.collectPlan();
        } finally {
            this.rl.close();
        }
    }

    private async collectPlan(): Promise<GenerationPlan | undefined> {
        const wordlistType = await this.selectWordlistType();
        if (!wordlistType) return undefined;

        const seeds = await this.readSeeds(wordlistType);
        if (!seeds) return undefined;

        const options = await this.readOptions(wordlistType);
        if (!options) return undefined;

        const providerId = await this.selectProvider();
        if (!providerId) return undefined;

        const model = await this.selectModel(providerId);
        if (!model) return undefined;

        const plan: GenerationPlan = { wordlistType, seeds, ...options, providerId, model };
        this.printSummary(plan);

        const answer = await this.ask('\nProceed? [Y/n]: ');
        if (answer === undefined || NO.includes(answer.toLowerCase())) {
            this.print('Cancelled.');
            return undefined;
        }
        return plan;
    }

    private async selectWordlistType(): Promise<string | undefined> {
        const types = this.registry.listWordlistTypes();
        this.print('\nSelect wordlist type:');
        types.forEach((definition, i) => this.print(`  ${i + 1}) ${definition.id.padEnd(16)} ${definition.description}`));

        const answer = await this.ask('\nChoice: ');
        if (answer === undefined) return undefined;

        const chosen = pickFromList(types.map(definition => definition.id), answer);
        if (!chosen) this.print('Invalid choice');
        return chosen;
    }

    private async readSeeds(wordlistType: string): Promise<string[] | undefined> {
        const { seedHints } = this.registry.getWordlistType(wordlistType);
        this.print('\nEnter seed words, one per line. An empty line finishes.');
        if (seedHints) this.print(seedHints);

        const seeds: string[] = [];
        for (; ;) {
            const answer = await this.ask(`Word ${seeds.length + 1}: `);
            if (answer === undefined) return undefined;
            if (answer.length > 0) {
                seeds.push(answer);
                this.print(`  ✓ Added: ${answer}`);
            } else if (seeds.length > 0) {
                return seeds;
            } else {
                this.print('Please enter at least one seed word');
            }
        }
    }

    private async readOptions(
        wordlistType: string
    ): Promise<Pick<GenerationPlan, 'targetLength' | 'extraInstructions' | 'outputPath' | 'append'> | undefined> {
        this.print('\nAdditional options (Enter keeps the default):');

        const length = await this.ask(`Wordlist length [${this.defaults.targetLength}]: `);
        if (length === undefined) return undefined;
        const parsedLength = Number(length);
        const targetLength = /^\d+$/.test(length) && parsedLength > 0 ? parsedLength : this.defaults.targetLength;

        const instructions = await this.ask('Additional instructions (optional): ');
        if (instructions === undefined) return undefined;

        const defaultPath = this.defaults.outputPathFor(this.registry.getWordlistType(wordlistType).defaultFilename);
        const output = await this.ask(`Output file [${defaultPath}]: `);
        if (output === undefined) return undefined;

        const append = await this.ask(`Append to file? ${this.defaults.append ? '[Y/n]' : '[y/N]'}: `);
        if (append === undefined) return undefined;

        return {
            targetLength,
            extraInstructions: instructions || undefined,
            outputPath: output ? path.resolve(output) : defaultPath,
            append: parseYesNo(append, this.defaults.append),
        };
    }

    private async selectProvider(): Promise<string | undefined> {
        const configured = this.registry.listProviders().filter(provider => provider.configured);
        if (configured.length === 0) {
            this.print('No provider has an API key. Run: wordforge config --provider <id> --key <key>');
            return undefined;
        }
        if (configured.length === 1) return configured[0].id;

        const preferred = this.registry.selectProviderId();
        this.print('\nSelect provider:');
        configured.forEach((provider, i) => {
            this.print(`  ${i + 1}) ${provider.displayName}${provider.id === preferred ? ' (default)' : ''}`);
        });

        const answer = await this.ask('\nChoice [default]: ');
        if (answer === undefined) return undefined;
        if (answer === '') return preferred;

        const chosen = pickFromList(configured.map(provider => provider.id), answer);
        if (!chosen) this.print('Invalid choice');
        return chosen;
    }

    private async selectModel(providerId: string): Promise<string | undefined> {
        const registration = this.registry.getProvider(providerId);
        const defaultModel = this.registry.resolveModel(providerId);
        if (registration.models.length <= 1 && !registration.acceptsAnyModel) return defaultModel;

        this.print(`\nSelect model for ${registration.displayName}:`);
        registration.models.forEach((model, i) => {
            this.print(`  ${i + 1}) ${model}${model === defaultModel ? ' (default)' : ''}`);
        });
        if (registration.acceptsAnyModel) this.print('  or type any model id');

        const answer = await this.ask(`\nChoice [${defaultModel}]: `);
        if (answer === undefined) return undefined;
        if (answer === '') return defaultModel;

        const chosen = pickFromList(registration.models, answer);
        if (chosen) return chosen;
        if (registration.acceptsAnyModel && !/^\d+$/.test(answer)) return answer;

        this.print('Invalid choice');
        return undefined;
    }

    private printSummary(plan: GenerationPlan): void {
        const displayName = this.registry.getProvider(plan.providerId).displayName;
        this.print('\nGeneration summary:');
        this.print(`  Type:     ${plan.wordlistType}`);
        this.print(`  Seeds:    ${plan.seeds.join(', ')}`);
        this.print(`  Length:   ${plan.targetLength}`);
        this.print(`  Provider: ${displayName}`);
        this.print(`  Model:    ${plan.model}`);
        this.print(`  Output:   ${plan.outputPath}${plan.append ? ' (append)' : ''}`);
        if (plan.extraInstructions) this.print(`  Extra:    ${plan.extraInstructions}`);
    }

    private async ask(question: string): Promise<string | undefined> {
        this.streams.output.write(question);
        const next = await this.lines.next();
        if (next.done) {
            this.print('');
            return undefined;
        }
        return next.value.trim();
    }

    private print(line: string): void {
        this.streams.output.write(`${line}\n`);
    }
}

/** A 1-based number or one of the ids itself. */
export function pickFromList(ids: string[], answer: string): string | undefined {
    if (/^\d+$/.test(answer)) {
        return ids[Number(answer) - 1];
    }
    return ids.find(id => id === answer);
}

export function parseYesNo(answer: string, fallback: boolean): boolean {
    const normalized = answer.trim().toLowerCase();
    if (YES.includes(normalized)) return true;
    if (NO.includes(normalized)) return false;
    return fallback;
}
