#!/usr/bin/env node
import { Command } from 'commander';
import path from 'path';
import { loadConfig } from './config';
import { AddressParser } from './modules/parser';
import { Pipeline } from './pipeline';

type CommonOptions = {
    config?: string;
    gazetteer?: string;
};

const buildParser = (options: CommonOptions): AddressParser => {
    const config = loadConfig(options.config ? path.resolve(options.config) : undefined);
    return AddressParser.fromConfig(config, options.gazetteer ? path.resolve(options.gazetteer) : undefined);
};

const fail = (e: unknown): never => {
    console.error('Fatal Error:', e instanceof Error ? e.message : String(e));
    process.exit(1);
};

const program = new Command();

program
    .name('vn-address')
    .description('Resolve province, district and ward from free-text Vietnamese addresses')
    .version('1.0.0');

program
    .command('parse')
    .description('Parse one address and print the result as JSON')
    .argument('<address...>', 'Address text (quote it, or pass it as several words)')
    .option('-c, --config <path>', 'Path to custom config YAML')
    .option('-g, --gazetteer <path>', 'Path to a gazetteer JSON/YAML file')
    .action((words: string[], options: CommonOptions) => {
        try {
            const parser = buildParser(options);
            console.log(JSON.stringify(parser.parseDetailed(words.join(' ')), null, 2));
        } catch (e: unknown) {
            fail(e);
        }
    });

program
    .command('resolve')
    .description('Resolve every address of a CSV file')
    .requiredOption('-i, --input <path>', 'Input CSV file path')
    .requiredOption('-o, --output <path>', 'Output CSV file path')
    .option('-c, --config <path>', 'Path to custom config YAML')
    .option('-g, --gazetteer <path>', 'Path to a gazetteer JSON/YAML file')
    .action(async (options: CommonOptions & { input: string; output: string }) => {
        try {
            const inputPath = path.resolve(options.input);
            const outputPath = path.resolve(options.output);

            console.log(`Input: ${inputPath}`);
            console.log(`Output: ${outputPath}`);

            const summary = await Pipeline.run(buildParser(options), inputPath, outputPath);

            console.log(`Done. ${summary.total} rows, ${summary.district} with a district, ${summary.error} errors.`);
        } catch (e: unknown) {
            fail(e);
        }
    });

program.parseAsync(process.argv).catch(fail);
