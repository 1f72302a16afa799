#!/usr/bin/env node
import path from 'path';
import { Command, InvalidArgumentError } from 'commander';
import { AppConfig, loadConfig, loadEnvFiles } from './config';
import { EnvFileStore, PREFERENCE_KEYS, PreferenceStore, Preferences, isPreferenceKey } from './config/preferences';
import { BatchOrchestrator } from './core/batch/batch_orchestrator';
import { WordlistGenerator } from './core/generators/wordlist_generator';
import { ProviderClient } from './core/providers/provider';
import { Registry } from './core/registry';
import { createDefaultRegistry, settingsFromConfig } from './core/registry/defaults';
import { GenerationRequest, SeedFileMode } from './types';
import { Logger } from './utils/logger';
import { ConfigurationError, toError } from './utils/errors';
import { RateLimiter } from './utils/rate_limiter';
import { SeedLoader } from './utils/seed_loader';
import { WordlistWriter } from './utils/wordlist_writer';
import { InteractiveSession } from './interactive_session';

interface AppContext {
    config: AppConfig;
    preferenceStore: PreferenceStore;
    preferences: Preferences;
    registry: Registry;
}

interface GenerateCliOptions {
    seeds: string[];
    output?: string;
    length?: number;
    provider?: string;
    model?: string;
    append?: boolean;
    instructions?: string;
    dryRun?: boolean;
    stdout?: boolean;
}

interface BatchCliOptions {
    output?: string;
    length?: number;
    provider?: string;
    model?: string;
    append?: boolean;
    instructions?: string;
    batchSize?: number;
    concurrency?: number;
    rpm?: number;
    mode: string;
    stopOnError?: boolean;
    dryRun?: boolean;
}

interface ConfigCliOptions {
    show?: boolean;
    provider?: string;
    key?: string;
    set?: string;
    get?: string;
    reset?: boolean;
}

export function parsePositiveInt(value: string): number {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed <= 0) {
        throw new InvalidArgumentError('must be a positive integer');
    }
    return parsed;
}

export function parseNonNegativeNumber(value: string): number {
    const parsed = Number(value);
    if (!Number.isFinite(parsed) || parsed < 0) {
        throw new InvalidArgumentError('must be a number >= 0');
    }
    return parsed;
}

/** `-s acme "new york" api,dev` -> ["acme", "new york", "api", "dev"] */
export function splitSeedArgs(args: string[]): string[] {
    return args.flatMap(arg => arg.split(',')).map(seed => seed.trim()).filter(seed => seed.length > 0);
}

export function maskKey(key: string): string {
    return key.length <= 8 ? '********' : `${key.slice(0, 4)}...${key.slice(-4)}`;
}

function isSeedFileMode(value: string): value is SeedFileMode {
    return value === 'line' || value === 'block';
}

function bootstrap(): AppContext {
    loadEnvFiles();
    const config = loadConfig();
    Logger.configure(config.logging);

    const preferenceStore = PreferenceStore.inDirectory(config.configDir);
    const preferences = preferenceStore.load();
    const registry = createDefaultRegistry(settingsFromConfig(config, preferences));
    return { config, preferenceStore, preferences, registry };
}

function targetLengthFor(ctx: AppContext, requested?: number): number {
    return requested ?? ctx.preferences.default_wordlist_length ?? ctx.config.defaultWordlistLength;
}

function outputPathFor(ctx: AppContext, requested: string | undefined, filename: string): string {
    return path.resolve(requested ?? path.join(ctx.preferences.output_directory, filename));
}

/**
 * First Ctrl+C asks the current operation to stop; a second one exits.
 */
function abortOnSigint(controller: AbortController): () => void {
    const handler = () => {
        if (controller.signal.aborted) {
            console.error('\nForced exit.');
            process.exit(130);
        }
        console.error('\n⏹️  Stopping after the current request (Ctrl+C again to force)...');
        controller.abort();
    };
    process.on('SIGINT', handler);
    return () => {
        process.off('SIGINT', handler);
    };
}

async function runGenerate(typeId: string, options: GenerateCliOptions): Promise<void> {
    const ctx = bootstrap();
    const generator = ctx.registry.resolveGenerator(typeId);
    const request = {
        wordlistType: typeId,
        seeds: splitSeedArgs(options.seeds),
        targetLength: targetLengthFor(ctx, options.length),
        extraInstructions: options.instructions,
    };

    if (options.dryRun) {
        const preview = generator.preview(request);
        console.log(`# system (${preview.wordlistType}, max_tokens=${preview.maxTokens})`);
        console.log(preview.system);
        console.log('\n# prompt');
        console.log(preview.prompt);
        return;
    }

    const providerId = ctx.registry.selectProviderId(options.provider);
    const provider = ctx.registry.resolveProvider(providerId, { model: options.model });
    await generateAndSave(ctx, generator, request, provider, {
        outputPath: outputPathFor(ctx, options.output, generator.definition.defaultFilename),
        append: options.append ?? ctx.preferences.append_by_default,
        stdout: options.stdout,
    });
}

async function generateAndSave(
    ctx: AppContext,
    generator: WordlistGenerator,
    request: GenerationRequest,
    provider: ProviderClient,
    target: { outputPath: string; append: boolean; stdout?: boolean }
): Promise<void> {
    const controller = new AbortController();
    const release = abortOnSigint(controller);
    try {
        const result = await generator.generate(request, provider, {
            signal: controller.signal,
            retryPolicy: ctx.config.retry,
        });

        if (target.stdout) {
            if (result.words.length > 0) process.stdout.write(`${result.words.join('\n')}\n`);
            return;
        }

        const writer = new WordlistWriter(target.outputPath, { append: target.append });
        await writer.write(result.words);

        console.log(`✅ ${result.actualCount}/${result.targetLength} ${request.wordlistType} words -> ${target.outputPath}`);
        console.log(`   ${result.provider} (${result.model}), ${result.attempts} attempt(s), ${result.durationMs}ms`);
        if (result.exhausted) {
            console.log(`   ⚠️  ${result.rejectedCount} rejected, ${result.duplicateCount} duplicate(s): list is shorter than requested`);
        }
        if (generator.definition.usageInstructions) {
            console.log(`\n${generator.definition.usageInstructions}`);
        }
    } finally {
        release();
    }
}

async function runInteractive(): Promise<void> {
    const ctx = bootstrap();
    console.log('🔨 wordforge: targeted wordlists for authorized security testing');

    const session = new InteractiveSession(ctx.registry, { input: process.stdin, output: process.stdout }, {
        targetLength: targetLengthFor(ctx),
        append: ctx.preferences.append_by_default,
        outputPathFor: filename => outputPathFor(ctx, undefined, filename),
    });
    const plan = await session.run();
    if (!plan) return;

    const generator = ctx.registry.resolveGenerator(plan.wordlistType);
    const provider = ctx.registry.resolveProvider(plan.providerId, { model: plan.model });
    await generateAndSave(ctx, generator, {
        wordlistType: plan.wordlistType,
        seeds: plan.seeds,
        targetLength: plan.targetLength,
        extraInstructions: plan.extraInstructions,
    }, provider, { outputPath: plan.outputPath, append: plan.append });
}

async function runBatch(input: string, typeId: string, options: BatchCliOptions): Promise<void> {
    const ctx = bootstrap();
    if (!isSeedFileMode(options.mode)) {
        throw new ConfigurationError(`--mode must be "line" or "block", got "${options.mode}"`);
    }

    const generator = ctx.registry.resolveGenerator(typeId);
    const seedSets = await SeedLoader.load(path.resolve(input), options.mode);
    const params = { targetLength: targetLengthFor(ctx, options.length), extraInstructions: options.instructions };

    if (options.dryRun) {
        const preview = generator.preview({ wordlistType: typeId, seeds: seedSets[0], ...params });
        console.log(`# ${seedSets.length} seed set(s); prompt for the first one:`);
        console.log(preview.prompt);
        return;
    }

    const providerId = ctx.registry.selectProviderId(options.provider);
    const provider = ctx.registry.resolveProvider(providerId, { model: options.model });
    const outputPath = outputPathFor(ctx, options.output, `${typeId}_batch_wordlist.txt`);
    const writer = new WordlistWriter(outputPath, {
        append: options.append ?? ctx.preferences.append_by_default,
        dedupe: true,
    });
    await writer.open();

    const requestsPerMinute = options.rpm ?? ctx.config.batch.requestsPerMinute;
    const controller = new AbortController();
    const release = abortOnSigint(controller);

    try {
        const result = await new BatchOrchestrator(generator, provider).run(seedSets, params, {
            batchSize: options.batchSize ?? ctx.config.batch.size,
            concurrency: options.concurrency ?? ctx.config.batch.concurrency,
            rateLimiter: requestsPerMinute > 0 ? new RateLimiter(requestsPerMinute) : undefined,
            stopOnError: options.stopOnError,
            signal: controller.signal,
            retryPolicy: ctx.config.retry,
            onResult: async (entry, index) => {
                const label = `[${index + 1}/${seedSets.length}] ${entry.seeds.join(', ')}`;
                if (entry.status === 'fulfilled') {
                    const added = await writer.write(entry.result.words);
                    console.log(`✅ ${label}: ${entry.result.actualCount} words (${added} new)`);
                } else if (entry.status === 'failed') {
                    console.log(`❌ ${label}: ${entry.error.message}`);
                } else {
                    console.log(`⏭️  ${label}: skipped (${entry.reason})`);
                }
            },
        });

        console.log(`\n🏁 ${result.succeeded} succeeded, ${result.failed} failed, ${result.skipped} skipped`);
        console.log(`   ${writer.written} unique words -> ${outputPath}`);

        if (result.aborted) process.exitCode = 130;
        else if (result.succeeded === 0 && result.failed > 0) process.exitCode = 1;
    } finally {
        release();
    }
}

function runTypes(): void {
    const { registry } = bootstrap();
    for (const definition of registry.listWordlistTypes()) {
        console.log(`${definition.id.padEnd(16)} ${definition.description}`);
        console.log(`${''.padEnd(16)} default file: ${definition.defaultFilename}`);
        if (definition.seedHints) {
            console.log(definition.seedHints.split('\n').map(line => `${''.padEnd(16)} ${line}`).join('\n'));
        }
        console.log('');
    }
}

function runProviders(): void {
    const { registry } = bootstrap();
    for (const provider of registry.listProviders()) {
        const status = provider.configured ? '✅ configured' : `❌ set ${provider.envVar}`;
        console.log(`${provider.id.padEnd(12)} ${provider.displayName} (${status})`);
        console.log(`${''.padEnd(12)} default model: ${provider.defaultModel}`);
        if (provider.models.length > 0) {
            console.log(`${''.padEnd(12)} models: ${provider.models.join(', ')}${provider.acceptsAnyModel ? ' (any model id accepted)' : ''}`);
        }
    }
}

function runConfig(options: ConfigCliOptions): void {
    const ctx = bootstrap();
    let acted = false;

    if (options.provider || options.key) {
        if (!options.provider || !options.key) {
            throw new ConfigurationError('--provider and --key must be given together');
        }
        const registration = ctx.registry.getProvider(options.provider);
        const store = EnvFileStore.inDirectory(ctx.config.configDir);
        store.set(registration.envVar, options.key.trim());
        console.log(`🔑 Saved ${registration.envVar} (${maskKey(options.key.trim())}) to ${store.filePath}`);
        acted = true;
    }

    if (options.set) {
        const separator = options.set.indexOf('=');
        if (separator <= 0) throw new ConfigurationError('--set expects key=value');
        const key = options.set.slice(0, separator).trim();
        ctx.preferenceStore.set(key, options.set.slice(separator + 1));
        console.log(`⚙️  ${key} updated in ${ctx.preferenceStore.filePath}`);
        acted = true;
    }

    if (options.get) {
        const key = options.get.trim();
        if (!isPreferenceKey(key)) {
            throw new ConfigurationError(`Unknown preference "${key}". Known: ${PREFERENCE_KEYS.join(', ')}`);
        }
        const value = ctx.preferenceStore.get(key);
        console.log(value === undefined ? '(unset)' : String(value));
        acted = true;
    }

    if (options.reset) {
        ctx.preferenceStore.reset();
        console.log(`♻️  Preferences reset (${ctx.preferenceStore.filePath})`);
        acted = true;
    }

    if (options.show || !acted) {
        const preferences = ctx.preferenceStore.load();
        console.log(`Config directory: ${ctx.config.configDir}`);
        console.log('\nAPI keys:');
        for (const provider of ctx.registry.listProviders()) {
            const key = ctx.config.apiKeys[provider.id];
            console.log(`  ${provider.envVar.padEnd(20)} ${key ? maskKey(key) : '(not set)'}`);
        }
        console.log('\nPreferences:');
        for (const key of PREFERENCE_KEYS) {
            const value = preferences[key];
            console.log(`  ${key.padEnd(26)} ${value === undefined ? '(unset)' : String(value)}`);
        }
        console.log(`\nDEFAULT_PROVIDER=${ctx.config.defaultProvider}${ctx.config.defaultModel ? ` DEFAULT_MODEL=${ctx.config.defaultModel}` : ''}`);
    }
}

export function buildProgram(): Command {
    const program = new Command();

    program
        .name('wordforge')
        .description('LLM-assisted targeted wordlists for authorized security testing')
        .version('1.0.0')
        .action(async () => runInteractive());

    program
        .command('generate')
        .description('Generate one wordlist from seed words')
        .addHelpText('after', '\nExample:\n  wordforge generate password -s acme 1999 -l 200')
        .argument('<type>', 'wordlist type (see: wordforge types); give it before -s')
        .requiredOption('-s, --seeds <seeds...>', 'seed words, space or comma separated; takes every word up to the next option')
        .option('-o, --output <path>', 'output file (default: the type\'s file in the output directory)')
        .option('-l, --length <n>', 'number of words to request', parsePositiveInt)
        .option('-p, --provider <id>', 'provider id')
        .option('-m, --model <model>', 'model id')
        .option('-a, --append', 'append to the output file instead of overwriting')
        .option('--instructions <text>', 'extra instructions appended to the prompt')
        .option('--stdout', 'print words to stdout instead of writing a file')
        .option('--dry-run', 'print the prompt without calling a provider')
        .action(async (type: string, options: GenerateCliOptions) => runGenerate(type, options));

    program
        .command('batch')
        .description('Generate one combined wordlist from a file of seed sets')
        .argument('<input>', 'seed file')
        .argument('<type>', 'wordlist type')
        .option('-o, --output <path>', 'output file (default: <type>_batch_wordlist.txt)')
        .option('-l, --length <n>', 'words per seed set', parsePositiveInt)
        .option('-p, --provider <id>', 'provider id')
        .option('-m, --model <model>', 'model id')
        .option('-a, --append', 'append to the output file instead of overwriting')
        .option('--instructions <text>', 'extra instructions appended to every prompt')
        .option('-b, --batch-size <n>', 'seed sets per sub-batch', parsePositiveInt)
        .option('-c, --concurrency <n>', 'max outstanding provider calls', parsePositiveInt)
        .option('--rpm <n>', 'requests per minute (0 = unlimited)', parseNonNegativeNumber)
        .option('--mode <mode>', 'seed file layout: line or block', 'line')
        .option('--stop-on-error', 'skip the remaining seed sets after the first failure')
        .option('--dry-run', 'print the first prompt without calling a provider')
        .action(async (input: string, type: string, options: BatchCliOptions) => runBatch(input, type, options));

    program
        .command('types')
        .description('List wordlist types')
        .action(() => runTypes());

    program
        .command('providers')
        .description('List providers, models and key status')
        .action(() => runProviders());

    program
        .command('config')
        .description('Show or change API keys and preferences')
        .option('--show', 'print the current configuration')
        .option('--provider <id>', 'provider whose key to store (with --key)')
        .option('--key <key>', 'API key to store in ~/.wordforge/.env')
        .option('--set <key=value>', 'set a preference')
        .option('--get <key>', 'print a preference')
        .option('--reset', 'reset preferences to defaults')
        .action((options: ConfigCliOptions) => runConfig(options));

    return program;
}

async function main(): Promise<void> {
    try {
        await buildProgram().parseAsync(process.argv);
    } catch (error) {
        const err = toError(error);
        Logger.debug('[CLI] Command failed', { error: err, error_category: Logger.categorizeError(err) });
        console.error(`❌ ${err.message}`);
        process.exit(1);
    }
}

if (require.main === module) {
    void main();
}
