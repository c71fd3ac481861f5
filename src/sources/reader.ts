import fs from 'fs/promises';

/**
 * Turns a document on disk into plain text.
 */
export interface DocumentReader {
    read(filePath: string): Promise<string>;
}

/**
 * Reads the file as UTF-8 text, dropping a leading byte order mark.
 */
export class PlainTextReader implements DocumentReader {
    async read(filePath: string): Promise<string> {
        const content = await fs.readFile(filePath, 'utf-8');
        return content.charCodeAt(0) === 0xfeff ? content.slice(1) : content;
    }
}
