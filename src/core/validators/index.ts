/**
 * ✅ WORD VALIDATORS
 * One pure predicate per wordlist type. These are the ground truth for what ends
 * up in a wordlist; prompts only describe the same rules to the model.
 */

export const PASSWORD_RULES = {
    minLength: 3,
    maxLength: 30,
    pattern: /^[A-Za-z0-9]+$/,
} as const;

// DNS label: 1-63 chars, alphanumeric edges
export const SUBDOMAIN_RULES = {
    minLength: 1,
    maxLength: 63,
    pattern: /^[a-z0-9]([a-z0-9-]{0,61}[a-z0-9])?$/,
} as const;

export const DIRECTORY_RULES = {
    minLength: 1,
    maxLength: 255,
    pattern: /^[A-Za-z0-9\-_.~/]+$/,
} as const;

// Bucket / storage-account / container style names
export const CLOUD_RESOURCE_RULES = {
    minLength: 3,
    maxLength: 63,
    pattern: /^[a-z0-9]([a-z0-9\-_]*[a-z0-9])?$/,
    forbiddenRuns: ['--', '__', '-_', '_-'],
} as const;

function withinLength(word: string, rules: { minLength: number; maxLength: number }): boolean {
    return word.length >= rules.minLength && word.length <= rules.maxLength;
}

export class Validators {
    static password(word: string): boolean {
        return withinLength(word, PASSWORD_RULES) && PASSWORD_RULES.pattern.test(word);
    }

    static subdomain(word: string): boolean {
        if (!withinLength(word, SUBDOMAIN_RULES)) return false;
        if (word.includes('--')) return false;
        return SUBDOMAIN_RULES.pattern.test(word);
    }

    static directory(word: string): boolean {
        if (!withinLength(word, DIRECTORY_RULES)) return false;
        if (word === '.' || word.includes('..')) return false; // traversal
        if (word.startsWith('/') || word.endsWith('/') || word.includes('//')) return false;
        return DIRECTORY_RULES.pattern.test(word);
    }

    static cloudResource(word: string): boolean {
        if (!withinLength(word, CLOUD_RESOURCE_RULES)) return false;
        if (CLOUD_RESOURCE_RULES.forbiddenRuns.some(run => word.includes(run))) return false;
        return CLOUD_RESOURCE_RULES.pattern.test(word);
    }
}
