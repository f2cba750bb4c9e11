import { Config, resolveProjectPath, toNormalizerDictionaries, toResolverOptions } from '../../config';
import { ParsedAddress, ResolutionResult } from '../../types';
import { AddressNormalizer } from '../normalizer';
import { Gazetteer } from '../gazetteer';
import { loadGazetteer } from '../gazetteer/loader';
import { HierarchicalResolver } from '../resolver';
import { ResultAssembler } from '../assembler';

/**
 * Normalize + resolve + assemble for one configuration and one gazetteer.
 * Holds no per-call state; a single instance can serve every request.
 */
export class AddressParser {
    private readonly normalizer: AddressNormalizer;
    private readonly resolver: HierarchicalResolver;
    private readonly assembler: ResultAssembler;

    constructor(config: Config, gazetteer: Gazetteer) {
        const resolverOptions = toResolverOptions(config);
        this.normalizer = new AddressNormalizer(toNormalizerDictionaries(config));
        this.resolver = new HierarchicalResolver(gazetteer, resolverOptions);
        this.assembler = new ResultAssembler(resolverOptions.sentinel);
    }

    static fromConfig(config: Config, gazetteerPath?: string): AddressParser {
        const gazetteer = loadGazetteer(resolveProjectPath(gazetteerPath || config.gazetteer.path));
        return new AddressParser(config, gazetteer);
    }

    normalize(input: unknown): string {
        return this.normalizer.normalize(input);
    }

    parse(input: unknown): ResolutionResult {
        return this.parseDetailed(input).result;
    }

    format(input: unknown): string {
        return this.parseDetailed(input).formatted;
    }

    parseDetailed(input: unknown): ParsedAddress {
        const normalized = this.normalizer.normalize(input);
        const resolution = this.resolver.resolve(normalized);
        const result = this.assembler.assemble(resolution);

        return {
            input: String(input),
            normalized,
            result,
            ids: {
                province: resolution.province?.id,
                district: resolution.district?.id,
                ward: resolution.ward?.id
            },
            province_inferred: resolution.provinceInferred,
            formatted: ResultAssembler.format(result)
        };
    }
}
