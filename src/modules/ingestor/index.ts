import fs from 'fs';
import { parse } from 'csv-parse';
import { z } from 'zod';
import { AddressRow } from '../../types';
import { TextUtils } from '../../utils/text';

export interface IngestResult {
    row: AddressRow;
    line_number: number;
}

const AddressRowSchema = z.object({
    address: z.string().trim().min(1),
    id: z.string().trim().optional(),
}).passthrough();

const DELIMITER_SAMPLE_BYTES = 64 * 1024;

export function detectDelimiter(filePath: string): string {
    const fd = fs.openSync(filePath, 'r');
    let sample: string;
    try {
        const buffer = Buffer.alloc(DELIMITER_SAMPLE_BYTES);
        const bytesRead = fs.readSync(fd, buffer, 0, buffer.length, 0);
        if (bytesRead <= 0) return ',';
        sample = buffer.toString('utf8', 0, bytesRead);
    } finally {
        fs.closeSync(fd);
    }

    const firstLine = sample.split(/\r?\n/)[0] || '';
    const commas = (firstLine.match(/,/g) || []).length;
    const semicolons = (firstLine.match(/;/g) || []).length;
    const tabs = (firstLine.match(/\t/g) || []).length;

    if (semicolons > commas && semicolons >= tabs) return ';';
    if (tabs > commas && tabs > semicolons) return '\t';
    return ',';
}

export function mapHeaders(headers: string[]): string[] {
    return headers.map(h => {
        const slug = TextUtils.removeAccent(h).toLowerCase().trim().replace(/[^a-z0-9]/g, '_');

        if (slug === 'id' || slug === 'ma' || slug.endsWith('_id') || slug.startsWith('ma_')) return 'id';
        if (slug.includes('address') || slug.includes('dia_chi') || slug.includes('diachi') || slug === 'addr') return 'address';
        return slug;
    });
}

export async function* ingestCSV(filePath: string): AsyncGenerator<IngestResult, void, unknown> {
    const delimiter = detectDelimiter(filePath);

    const parser = fs.createReadStream(filePath).pipe(parse({
        columns: (header: string[]) => mapHeaders(header),
        delimiter: delimiter,
        bom: true,
        trim: true,
        skip_empty_lines: true,
        relax_column_count: true
    }));

    let lineCount = 0;
    for await (const record of parser) {
        lineCount++;
        const parsed = AddressRowSchema.safeParse(record);
        if (!parsed.success) continue;

        const { address, id } = parsed.data;
        yield { row: { address, id: id || undefined }, line_number: lineCount };
    }
}
