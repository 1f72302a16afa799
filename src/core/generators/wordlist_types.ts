import { WordlistTypeDefinition } from '../../types';
import { Validators } from '../validators';
import { formatList, formatNumberedList, CLOUD_RESOURCE_PROMPT, DIRECTORY_PROMPT, PASSWORD_PROMPT, SUBDOMAIN_PROMPT } from '../prompts/prompt_templates';

const toLowerCase = (word: string) => word.toLowerCase();

export const PASSWORD_TYPE: WordlistTypeDefinition = {
    id: 'password',
    description: 'Base words for password cracking with mutation rules',
    validate: Validators.password,
    defaultFilename: 'password_base_wordlist.txt',
    prompt: PASSWORD_PROMPT,
    seedHints: `For password base words, describe the person or account behind the hash:
${formatList([
    'Names, nicknames, usernames',
    'Dates: birthdays, anniversaries, graduation years',
    'Family members and pets',
    'Places lived, hometown, favourite destinations',
    'Hobbies, sports teams, bands, films',
    'Employer, job title, projects',
], '•')}

Example: john smith may31989 fluffy chicago bears accounting`,
    usageInstructions: `Next steps:
${formatNumberedList([
    'Feed the list to Hashcat with a rule file: hashcat -a 0 -m <hash_type> <hashes> password_base_wordlist.txt -r rules/best64.rule',
    'Try heavier rule sets (d3ad0ne.rule, dive.rule) once best64 is exhausted',
    'Hybrid attacks append masks: hashcat -a 6 -m <hash_type> <hashes> password_base_wordlist.txt ?d?d?d?d',
])}`,
};

export const SUBDOMAIN_TYPE: WordlistTypeDefinition = {
    id: 'subdomain',
    description: 'Subdomain labels for DNS enumeration',
    validate: Validators.subdomain,
    normalize: toLowerCase,
    defaultFilename: 'subdomain_wordlist.txt',
    prompt: SUBDOMAIN_PROMPT,
    seedHints: `For subdomains, describe the organization:
${formatList([
    'Company name, abbreviations, ticker, brands',
    'Industry and sector terms',
    'Known technology stack and cloud platforms',
    'Office locations and regions',
    'Products, services, project codenames',
    'Departments and business units',
], '•')}

Example: acmecorp acme fintech aws newyork payments`,
    usageInstructions: `Next steps:
${formatNumberedList([
    'gobuster dns -d target.com -w subdomain_wordlist.txt',
    'ffuf -u https://FUZZ.target.com -w subdomain_wordlist.txt',
    'Check for wildcard DNS before trusting hits',
])}`,
};

export const DIRECTORY_TYPE: WordlistTypeDefinition = {
    id: 'directory',
    description: 'Directory and file paths for web content discovery',
    validate: Validators.directory,
    defaultFilename: 'directory_wordlist.txt',
    prompt: DIRECTORY_PROMPT,
    seedHints: `For directories and files, describe the application:
${formatList([
    'Framework or CMS (WordPress, Django, Laravel, Spring)',
    'Web server and language (nginx, IIS, PHP, Java)',
    'Application purpose (shop, blog, API, admin panel)',
    'Company and product names',
    'Paths already discovered',
], '•')}

Example: wordpress acmecorp blog php apache ecommerce`,
    usageInstructions: `Next steps:
${formatNumberedList([
    'ffuf -u https://target.com/FUZZ -w directory_wordlist.txt',
    'gobuster dir -u https://target.com -w directory_wordlist.txt -x php,bak,zip',
    'Recurse into interesting hits with the same list',
])}`,
};

export const CLOUD_RESOURCE_TYPE: WordlistTypeDefinition = {
    id: 'cloud-resource',
    description: 'Bucket, storage account and container names for cloud enumeration',
    validate: Validators.cloudResource,
    normalize: toLowerCase,
    defaultFilename: 'cloud_resource_wordlist.txt',
    prompt: CLOUD_RESOURCE_PROMPT,
    seedHints: `For cloud resources, describe the organization and its cloud footprint:
${formatList([
    'Company name and abbreviations',
    'Cloud provider(s): aws, gcp, azure',
    'Products and internal project names',
    'Teams and environments',
    'Regions',
], '•')}

Example: tesla aws autopilot telemetry prod us-west`,
    usageInstructions: `Next steps:
${formatNumberedList([
    'cloud_enum -k <keyword> --mutations cloud_resource_wordlist.txt',
    's3scanner scan --buckets-file cloud_resource_wordlist.txt',
    'Only test resources covered by your authorization',
])}`,
};

export const BUILT_IN_WORDLIST_TYPES: WordlistTypeDefinition[] = [
    PASSWORD_TYPE,
    SUBDOMAIN_TYPE,
    DIRECTORY_TYPE,
    CLOUD_RESOURCE_TYPE,
];
