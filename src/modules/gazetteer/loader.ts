import fs from 'fs';
import path from 'path';
import yaml from 'js-yaml';
import { Gazetteer } from './index';
import { ConfigurationError } from '../../utils/errors';
import { logger } from '../observability';

function readDocument(filePath: string): unknown {
    let contents: string;
    try {
        contents = fs.readFileSync(filePath, 'utf8');
    } catch (e: unknown) {
        const reason = e instanceof Error ? e.message : String(e);
        throw new ConfigurationError(`Cannot read gazetteer file ${filePath}: ${reason}`, { path: filePath });
    }

    const ext = path.extname(filePath).toLowerCase();
    try {
        return ext === '.yaml' || ext === '.yml' ? yaml.load(contents) : JSON.parse(contents);
    } catch (e: unknown) {
        const reason = e instanceof Error ? e.message : String(e);
        throw new ConfigurationError(`Malformed gazetteer file ${filePath}: ${reason}`, { path: filePath });
    }
}

export function loadGazetteer(filePath: string): Gazetteer {
    const gazetteer = Gazetteer.fromData(readDocument(filePath));
    const stats = gazetteer.getStats();
    logger.log('info', `Gazetteer loaded from ${filePath}`, stats);
    return gazetteer;
}
