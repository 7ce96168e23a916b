import { readFileSync } from 'node:fs';
import { extname } from 'node:path';
import { z } from 'zod';
import type { PhraseInput } from '../types/index.js';

const jsonPhrasesSchema = z.array(
    z.union([
        z.string(),
        z.object({ text: z.string(), source: z.string().nullable().optional() }),
    ])
);

const CSV_HEADERS = new Set(['phrase', 'keyword', 'query', 'text']);

/**
 * First field of a CSV line; handles quoted fields with doubled quotes.
 */
export function firstCsvField(line: string): string {
    if (!line.startsWith('"')) {
        return line.split(',')[0] ?? '';
    }

    let value = '';
    for (let i = 1; i < line.length; i++) {
        const char = line[i];
        if (char === '"') {
            if (line[i + 1] === '"') {
                value += '"';
                i++;
                continue;
            }
            break;
        }
        value += char;
    }
    return value;
}

/**
 * Parse phrase file contents by extension: `.json` (strings or `{text, source}`
 * objects), `.csv` (first column, optional header), anything else one phrase per line.
 */
export function parsePhrases(content: string, extension: string): Array<string | PhraseInput> {
    switch (extension.toLowerCase()) {
        case '.json': {
            const parsed = jsonPhrasesSchema.safeParse(JSON.parse(content));
            if (!parsed.success) {
                throw new Error('JSON phrase file must be an array of strings or {text, source} objects');
            }
            return parsed.data;
        }
        case '.csv': {
            const lines = content.split(/\r?\n/).filter((line) => line.trim() !== '');
            const fields = lines.map((line) => firstCsvField(line).trim());
            if (fields[0] !== undefined && CSV_HEADERS.has(fields[0].toLowerCase())) {
                fields.shift();
            }
            return fields;
        }
        default:
            return content.split(/\r?\n/).filter((line) => line.trim() !== '');
    }
}

export function readPhraseFile(path: string): Array<string | PhraseInput> {
    return parsePhrases(readFileSync(path, 'utf-8'), extname(path));
}
