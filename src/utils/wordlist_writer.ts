import * as fs from 'fs/promises';
import * as path from 'path';
import { Logger } from './logger';

export interface WordlistWriterOptions {
    append?: boolean;
    /** Skip words already written by this writer instance. */
    dedupe?: boolean;
}

/**
 * 💾 WORDLIST WRITER
 * One word per line, UTF-8. Every `write()` hits the disk before it resolves, so
 * an interrupted batch leaves a file holding every finished seed set.
 */
export class WordlistWriter {
    private readonly seen = new Set<string>();
    private initialized = false;
    private total = 0;

    constructor(public readonly filePath: string, private readonly options: WordlistWriterOptions = {}) { }

    get written(): number {
        return this.total;
    }

    /**
     * Creates the file (truncating it unless appending). Called before a run so
     * a run that writes nothing still replaces the previous list.
     */
    async open(): Promise<void> {
        if (this.initialized) return;
        await fs.mkdir(path.dirname(path.resolve(this.filePath)), { recursive: true });
        if (this.options.append) await fs.appendFile(this.filePath, '', 'utf-8');
        else await fs.writeFile(this.filePath, '', 'utf-8');
        this.initialized = true;
    }

    /** Returns how many words were actually written. */
    async write(words: string[]): Promise<number> {
        const fresh = this.options.dedupe
            ? words.filter(word => {
                if (this.seen.has(word)) return false;
                this.seen.add(word);
                return true;
            })
            : words;

        await this.open();

        if (fresh.length > 0) {
            await fs.appendFile(this.filePath, `${fresh.join('\n')}\n`, 'utf-8');
            this.total += fresh.length;
        }

        Logger.debug(`[Writer] ${fresh.length} word(s) -> ${this.filePath}`, {
            skipped: words.length - fresh.length,
        });
        return fresh.length;
    }
}
