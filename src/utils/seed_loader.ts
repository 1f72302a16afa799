import * as fs from 'fs/promises';
import { SeedFileMode } from '../types';
import { InvalidRequestError } from './errors';

/**
 * 🌱 SEED FILES
 *
 * line  - one seed set per line, seeds separated by commas or whitespace
 * block - seed sets separated by blank lines, one seed per line (seeds may contain spaces)
 *
 * Lines starting with # are comments in both modes.
 */
export class SeedLoader {
    static parse(text: string, mode: SeedFileMode = 'line'): string[][] {
        const lines = text.split(/\r?\n/).map(line => line.trim());
        return mode === 'block' ? this.parseBlocks(lines) : this.parseLines(lines);
    }

    static async load(filePath: string, mode: SeedFileMode = 'line'): Promise<string[][]> {
        const text = await fs.readFile(filePath, 'utf-8');
        const seedSets = this.parse(text, mode);
        if (seedSets.length === 0) {
            throw new InvalidRequestError(`No seed sets found in ${filePath}`, [`${filePath}: empty`]);
        }
        return seedSets;
    }

    private static parseLines(lines: string[]): string[][] {
        return lines
            .filter(line => line.length > 0 && !line.startsWith('#'))
            .map(line => line.split(/[,\s]+/).filter(seed => seed.length > 0))
            .filter(seeds => seeds.length > 0);
    }

    private static parseBlocks(lines: string[]): string[][] {
        const seedSets: string[][] = [];
        let current: string[] = [];

        for (const line of lines) {
            if (line.startsWith('#')) continue;
            if (line.length === 0) {
                if (current.length > 0) seedSets.push(current);
                current = [];
                continue;
            }
            current.push(line);
        }
        if (current.length > 0) seedSets.push(current);

        return seedSets;
    }
}
