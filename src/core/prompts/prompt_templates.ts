import { PromptTemplate, PromptVars } from '../../types';
import { CLOUD_RESOURCE_RULES, DIRECTORY_RULES, PASSWORD_RULES, SUBDOMAIN_RULES } from '../validators';

/**
 * 📝 PROMPT TEMPLATES LIBRARY
 *
 * One template per wordlist type. Each template states the target count and the
 * same format rules the validators enforce: the model's output is advisory, the
 * validators decide what is kept.
 */

export function formatList(items: string[], bullet: string = '-'): string {
    return items.map(item => `${bullet} ${item}`).join('\n');
}

export function formatNumberedList(items: string[]): string {
    return items.map((item, i) => `${i + 1}. ${item}`).join('\n');
}

export const SHARED_FRAGMENTS = {
    authorization:
        'This wordlist supports an authorized penetration test or security assessment where testing is explicitly permitted.',

    outputContract: (length: number, noun: string) => formatList([
        `Output exactly ${length} ${noun}`,
        'One item per line, no numbering, bullets, headings or explanations',
        'No duplicates',
    ]),

    diversity: formatList([
        'Roughly 30% obvious patterns, 40% mutations and variations, 20% creative but plausible names, 10% edge cases',
        'Avoid clustering near-identical variants together',
    ]),

    regionalHints:
        'Only if the seed words carry regional or cultural hints (cities, countries, non-English words), include local spellings, terminology and references.',
};

// ═══════════════════════════════════════════════════════════════════════════════
// PASSWORD BASE WORDS
// ═══════════════════════════════════════════════════════════════════════════════

export const PASSWORD_PROMPT: PromptTemplate = {
    system: 'You are a red team operator who builds base wordlists for password cracking rule engines such as Hashcat.',

    template: (vars: PromptVars) => `
${SHARED_FRAGMENTS.authorization}

Given these seed words about the target: ${vars.seeds}

Generate ${vars.length} base words that a rule engine will later mutate (case, digits, symbols, combinations).

FOCUS ON:
${formatList([
    'Words semantically tied to the seeds: synonyms, nicknames, associated concepts',
    'Spelling variants (color/colour, center/centre)',
    'Related proper nouns: teams, places, brands, characters',
    'Compound words built from the seeds',
    'Context or industry terminology implied by the seeds',
])}
${SHARED_FRAGMENTS.regionalHints}

FORMAT RULES:
${formatList([
    `Letters and digits only (A-Z, a-z, 0-9), ${PASSWORD_RULES.minLength}-${PASSWORD_RULES.maxLength} characters`,
    'No special characters, spaces, leetspeak or appended numbers: the rule engine adds those',
])}

OUTPUT:
${SHARED_FRAGMENTS.outputContract(vars.length, 'base words')}
${SHARED_FRAGMENTS.diversity}
`.trim(),
};

// ═══════════════════════════════════════════════════════════════════════════════
// SUBDOMAINS
// ═══════════════════════════════════════════════════════════════════════════════

export const SUBDOMAIN_PROMPT: PromptTemplate = {
    system: 'You are a red team operator specialising in DNS reconnaissance and subdomain enumeration.',

    template: (vars: PromptVars) => `
${SHARED_FRAGMENTS.authorization}

Given these seed words about the organization: ${vars.seeds}

Generate ${vars.length} likely subdomain labels for this organization.

FOCUS ON:
${formatList([
    'Environments and lifecycle: api, dev, staging, prod, test, uat, qa, demo',
    'Departments and business units: hr, finance, it, sales',
    'Regions and locations: us-east, eu-west, office codes',
    'Services: mail, vpn, sso, portal, git, ci',
    'Versions and legacy: v1, v2, old, new, legacy',
    'Combinations of the seed words with the patterns above (acme-api, acme-dev)',
])}

FORMAT RULES:
${formatList([
    'Lowercase letters, digits and hyphens only',
    'No hyphen at the start or end, no consecutive hyphens',
    `${SUBDOMAIN_RULES.minLength}-${SUBDOMAIN_RULES.maxLength} characters (a single DNS label, no dots)`,
])}

OUTPUT:
${SHARED_FRAGMENTS.outputContract(vars.length, 'subdomain labels')}
${SHARED_FRAGMENTS.diversity}
`.trim(),
};

// ═══════════════════════════════════════════════════════════════════════════════
// DIRECTORIES & FILES
// ═══════════════════════════════════════════════════════════════════════════════

export const DIRECTORY_PROMPT: PromptTemplate = {
    system: 'You are a web application tester who builds content-discovery wordlists for fuzzers such as ffuf and gobuster.',

    template: (vars: PromptVars) => `
${SHARED_FRAGMENTS.authorization}

Given these seed words about the target application: ${vars.seeds}

Generate ${vars.length} directory and file paths worth requesting on the target.

FOCUS ON:
${formatList([
    'Common directories: admin, backup, config, logs, uploads, tmp',
    'Framework paths implied by the seeds (wp-admin, wp-content/uploads, actuator/health)',
    'Backup and leftover files: backup.zip, site.tar.gz, dump.sql, config.php.bak',
    'API routes: api/v1, graphql, rest/users',
    'Hidden files: .git/config, .env, .htaccess',
    'Single-level and multi-level paths, directories and files mixed',
])}

FORMAT RULES:
${formatList([
    'NO leading or trailing slash (write admin or api/v1, never /admin)',
    'Only letters, digits, hyphens, underscores, dots, tildes and forward slashes',
    'No ".." segments and no empty segments',
    `At most ${DIRECTORY_RULES.maxLength} characters`,
])}

OUTPUT:
${SHARED_FRAGMENTS.outputContract(vars.length, 'paths')}
`.trim(),
};

// ═══════════════════════════════════════════════════════════════════════════════
// CLOUD RESOURCES
// ═══════════════════════════════════════════════════════════════════════════════

export const CLOUD_RESOURCE_PROMPT: PromptTemplate = {
    system: 'You are a cloud security tester who knows how engineers actually name buckets, storage accounts and containers.',

    template: (vars: PromptVars) => `
${SHARED_FRAGMENTS.authorization}

Given these seed words about the organization: ${vars.seeds}

Generate ${vars.length} realistic cloud resource names (S3 buckets, GCS buckets, Azure containers) this organization might use.

FOCUS ON:
${formatList([
    'Company abbreviations and variants (tesla -> tsl, tsla)',
    'Project codenames and internal tools (telemetry-processor, ota-staging)',
    'Team and department buckets (eng-assets, mktg-exports, fin-reports)',
    'Environment and region suffixes (-prod, -dev, -eu, -us-east-1)',
    'Data classes and purposes (backups, logs, customer-uploads, public-assets)',
])}

FORMAT RULES:
${formatList([
    'Lowercase letters, digits, hyphens and underscores only',
    'Start and end with a letter or digit; no "--", "__", "-_" or "_-"',
    `${CLOUD_RESOURCE_RULES.minLength}-${CLOUD_RESOURCE_RULES.maxLength} characters`,
])}

OUTPUT:
${SHARED_FRAGMENTS.outputContract(vars.length, 'resource names')}
${SHARED_FRAGMENTS.diversity}
`.trim(),
};
