import fs from 'fs';
import { once } from 'events';
import crypto from 'crypto';
import * as fastcsv from 'fast-csv';
import { ingestCSV } from '../modules/ingestor';
import { AddressParser } from '../modules/parser';
import { logger, Metrics } from '../modules/observability';
import { AddressRow, OutputRow } from '../types';

/**
 * Backpressure-safe CSV writer.
 * Serializes writes and respects stream drain.
 */
class AsyncCsvWriter {
    private queue: OutputRow[] = [];
    private writing = false;

    constructor(private stream: fastcsv.CsvFormatterStream<OutputRow, OutputRow>) { }

    async write(row: OutputRow): Promise<void> {
        this.queue.push(row);
        if (!this.writing) await this.drainLoop();
    }

    private async drainLoop(): Promise<void> {
        this.writing = true;
        let row = this.queue.shift();
        while (row) {
            const ok = this.stream.write(row);
            if (!ok) await once(this.stream, 'drain');
            row = this.queue.shift();
        }
        this.writing = false;
    }

    async end(): Promise<void> {
        await this.drainLoop();
        this.stream.end();
    }
}

export class Pipeline {

    static async run(parser: AddressParser, inputPath: string, outputPath: string): Promise<ReturnType<Metrics['getSummary']>> {
        const metrics = new Metrics();
        const runId = `run-${crypto.randomUUID()}`;
        logger.log('info', `Pipeline run started: ${runId}`, { input: inputPath, output: outputPath });

        const writeStream = fs.createWriteStream(outputPath);
        await once(writeStream, 'open');

        const csvStream = fastcsv.format<OutputRow, OutputRow>({ headers: true });
        csvStream.pipe(writeStream);
        const writer = new AsyncCsvWriter(csvStream);

        try {
            for await (const { row, line_number } of ingestCSV(inputPath)) {
                await Pipeline.processRow(parser, metrics, writer, row, line_number);
            }
        } catch (e: unknown) {
            csvStream.destroy();
            writeStream.destroy();
            throw e;
        }

        const finished = once(writeStream, 'finish');
        await writer.end();
        await finished;

        const summary = metrics.getSummary();
        logger.log('info', `Pipeline run finished: ${runId}`, summary);
        return summary;
    }

    private static async processRow(
        parser: AddressParser,
        metrics: Metrics,
        writer: AsyncCsvWriter,
        row: AddressRow,
        lineNumber: number
    ): Promise<void> {
        const start = Date.now();
        const id = row.id ?? String(lineNumber);

        try {
            const parsed = parser.parseDetailed(row.address);
            metrics.record(parsed.result, Date.now() - start, parsed.province_inferred);
            await writer.write({
                id,
                address: row.address,
                normalized: parsed.normalized,
                ...parsed.result,
                formatted: parsed.formatted,
                error_message: ''
            });
        } catch (e: unknown) {
            const message = e instanceof Error ? e.message : String(e);
            metrics.recordError(Date.now() - start);
            logger.log('warn', `Row ${lineNumber}: ${message}`, { id });
            await writer.write({
                id,
                address: row.address,
                normalized: '',
                remainder: '',
                ward: '',
                district: '',
                province: '',
                formatted: '',
                error_message: message
            });
        }
    }
}
