export interface GenerationRequest {
    wordlistType: string;
    seeds: string[];
    targetLength: number;
    extraInstructions?: string;

    // Overrides resolved by the registry before the request reaches a generator
    provider?: string;
    model?: string;
}

export interface ProviderIdentity {
    provider: string;
    model: string;
}

export interface PromptVars {
    seeds: string;
    length: number;
}

export interface PromptTemplate {
    system: string;
    template: (vars: PromptVars) => string;
}

/**
 * A wordlist type owns its validation predicate, default output filename and
 * prompt. Everything else is help text for the CLI.
 */
export interface WordlistTypeDefinition {
    id: string;
    description: string;
    validate: (word: string) => boolean;
    defaultFilename: string;
    prompt: PromptTemplate;
    normalize?: (word: string) => string;
    seedHints?: string;
    usageInstructions?: string;
}

export interface PromptPreview {
    wordlistType: string;
    system: string;
    prompt: string;
    maxTokens: number;
}

export interface ProcessedCompletion {
    words: string[];
    candidateCount: number;
    rejectedCount: number;
    duplicateCount: number;
    truncatedCount: number;
}

export interface GenerationResult {
    words: string[];
    wordlistType: string;
    seeds: string[];
    provider: string;
    model: string;
    targetLength: number;
    actualCount: number;
    candidateCount: number;
    rejectedCount: number;
    duplicateCount: number;
    /** Fewer valid unique words than requested. Not an error. */
    exhausted: boolean;
    attempts: number;
    durationMs: number;
}

export type BatchEntry =
    | { status: 'fulfilled'; seeds: string[]; result: GenerationResult }
    | { status: 'failed'; seeds: string[]; error: Error }
    | { status: 'skipped'; seeds: string[]; reason: 'aborted' | 'stopped' };

export interface BatchResult {
    entries: BatchEntry[];
    succeeded: number;
    failed: number;
    skipped: number;
    aborted: boolean;
}

export type SeedFileMode = 'line' | 'block';
