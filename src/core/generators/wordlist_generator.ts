import { z } from 'zod';
import { GenerationRequest, GenerationResult, ProcessedCompletion, PromptPreview, WordlistTypeDefinition } from '../../types';
import { Logger } from '../../utils/logger';
import { InvalidRequestError, WordforgeError, toError } from '../../utils/errors';
import { ProviderClient } from '../providers/provider';
import { RetryPolicy, SleepFn, completeWithRetry, estimateMaxTokens } from '../providers/retry';
import { parseCompletion } from './completion_parser';

export enum GenerationState {
    BUILDING_PROMPT = 'BUILDING_PROMPT',
    AWAITING_COMPLETION = 'AWAITING_COMPLETION',
    PARSING = 'PARSING',
    VALIDATING = 'VALIDATING',
    SIZING = 'SIZING',
    DONE = 'DONE',
    FAILED = 'FAILED',
}

export type StateObserver = (state: GenerationState, request: GenerationRequest) => void;

export interface GenerateOptions {
    signal?: AbortSignal;
    onStateChange?: StateObserver;
    retryPolicy?: RetryPolicy;
    sleep?: SleepFn;
}

export interface GeneratorSettings {
    maxTokensCeiling: number;
}

const GenerationRequestSchema = z.object({
    wordlistType: z.string().min(1),
    seeds: z.array(z.string()),
    targetLength: z.number().int().positive(),
    extraInstructions: z.string().optional(),
    provider: z.string().optional(),
    model: z.string().optional(),
});

/**
 * 🏭 WORDLIST GENERATOR
 *
 * One instance per wordlist type. Holds no state between calls: every
 * `generate()` builds its prompt, calls the provider through the shared retry
 * loop and returns a fresh result.
 */
export class WordlistGenerator {
    constructor(
        public readonly definition: WordlistTypeDefinition,
        private readonly settings: GeneratorSettings = { maxTokensCeiling: 4000 }
    ) { }

    /**
     * Trims seeds, drops empty ones and checks the target length.
     */
    normalizeRequest(request: GenerationRequest): GenerationRequest {
        const parsed = GenerationRequestSchema.safeParse(request);
        if (!parsed.success) {
            const issues = parsed.error.issues.map(issue => `${issue.path.join('.') || 'request'}: ${issue.message}`);
            throw new InvalidRequestError(`Invalid generation request: ${issues.join('; ')}`, issues);
        }

        const seeds = parsed.data.seeds.map(seed => seed.trim()).filter(seed => seed.length > 0);
        if (seeds.length === 0) {
            throw new InvalidRequestError('At least one non-empty seed word is required', ['seeds: empty']);
        }
        if (parsed.data.wordlistType !== this.definition.id) {
            throw new InvalidRequestError(
                `Request for "${parsed.data.wordlistType}" sent to the ${this.definition.id} generator`,
                ['wordlistType: mismatch']
            );
        }

        const extraInstructions = parsed.data.extraInstructions?.trim();
        return { ...parsed.data, seeds, extraInstructions: extraInstructions || undefined };
    }

    buildPrompt(request: GenerationRequest): string {
        const prompt = this.definition.prompt.template({
            seeds: request.seeds.join(', '),
            length: request.targetLength,
        });
        return request.extraInstructions
            ? `${prompt}\n\nAdditional instructions: ${request.extraInstructions}`
            : prompt;
    }

    /** Exactly what `generate()` would send, without contacting a provider. */
    preview(request: GenerationRequest): PromptPreview {
        const normalized = this.normalizeRequest(request);
        const prompt = this.buildPrompt(normalized);
        return {
            wordlistType: this.definition.id,
            system: this.definition.prompt.system,
            prompt,
            maxTokens: estimateMaxTokens(prompt, normalized.targetLength, this.settings.maxTokensCeiling),
        };
    }

    /**
     * Parse, normalize, validate, dedupe and truncate. Pure: feeding its own
     * output back in (joined by newlines) returns the same words.
     */
    processCompletion(raw: string, targetLength: number): ProcessedCompletion {
        const candidates = parseCompletion(raw);
        const normalize = this.definition.normalize;

        const seen = new Set<string>();
        const unique: string[] = [];
        let rejectedCount = 0;
        let duplicateCount = 0;

        for (const candidate of candidates) {
            const word = normalize ? normalize(candidate) : candidate;
            if (!this.definition.validate(word)) {
                rejectedCount++;
                Logger.debug(`[Generator] Rejected ${this.definition.id} candidate`, { candidate });
                continue;
            }
            if (seen.has(word)) {
                duplicateCount++;
                continue;
            }
            seen.add(word);
            unique.push(word);
        }

        const words = unique.slice(0, targetLength);
        return {
            words,
            candidateCount: candidates.length,
            rejectedCount,
            duplicateCount,
            truncatedCount: unique.length - words.length,
        };
    }

    async generate(request: GenerationRequest, provider: ProviderClient, options: GenerateOptions = {}): Promise<GenerationResult> {
        const startTime = Date.now();
        const notify = (state: GenerationState) => options.onStateChange?.(state, request);

        try {
            notify(GenerationState.BUILDING_PROMPT);
            const normalized = this.normalizeRequest(request);
            const prompt = this.buildPrompt(normalized);
            const maxTokens = estimateMaxTokens(prompt, normalized.targetLength, this.settings.maxTokensCeiling);
            const { provider: providerName, model } = provider.identify();

            notify(GenerationState.AWAITING_COMPLETION);
            Logger.info(`[Generator] Requesting ${normalized.targetLength} ${this.definition.id} words from ${providerName}`, {
                provider: providerName,
                model,
                seed_count: normalized.seeds.length,
                maxTokens,
            });
            const { text, attempts } = await completeWithRetry(provider, prompt, maxTokens, {
                system: this.definition.prompt.system,
                signal: options.signal,
                policy: options.retryPolicy,
                sleep: options.sleep,
            });

            // Parsing, validation and sizing run as one pure step; observers still see each phase.
            notify(GenerationState.PARSING);
            notify(GenerationState.VALIDATING);
            const processed = this.processCompletion(text, normalized.targetLength);
            notify(GenerationState.SIZING);

            const exhausted = processed.words.length < normalized.targetLength;
            if (exhausted) {
                Logger.warn(
                    `[Generator] Only ${processed.words.length}/${normalized.targetLength} valid ${this.definition.id} words after filtering`,
                    { rejected: processed.rejectedCount, duplicates: processed.duplicateCount }
                );
            }

            const result: GenerationResult = {
                words: processed.words,
                wordlistType: this.definition.id,
                seeds: normalized.seeds,
                provider: providerName,
                model,
                targetLength: normalized.targetLength,
                actualCount: processed.words.length,
                candidateCount: processed.candidateCount,
                rejectedCount: processed.rejectedCount,
                duplicateCount: processed.duplicateCount,
                exhausted,
                attempts,
                durationMs: Date.now() - startTime,
            };

            notify(GenerationState.DONE);
            Logger.info(`[Generator] ✅ ${result.actualCount} ${this.definition.id} words in ${result.durationMs}ms`, {
                provider: providerName,
                attempts,
            });
            return result;
        } catch (error) {
            notify(GenerationState.FAILED);
            if (!(error instanceof WordforgeError)) {
                Logger.error(`[Generator] Unexpected failure generating ${this.definition.id} wordlist`, { error: toError(error) });
            }
            throw error;
        }
    }
}
