import { AdministrativeUnit, District, Province, Resolution, ResolverOptions, Ward } from '../../types';
import { Gazetteer } from '../gazetteer';
import { TextUtils } from '../../utils/text';
import { logger } from '../observability';

export type MatchMode = 'plain' | 'anchored';

type CompiledAlias = {
    word: string;
    anchored: RegExp; // word followed by one special-ending character
};

export type AliasMatch<T extends AdministrativeUnit> = {
    unit: T;
    word: string;
    index: number;
};

/**
 * Walks province -> district -> ward over a normalized address, consuming the
 * matched alias text at each level. Stages never backtrack.
 *
 * At every level the winner is the alias whose last occurrence starts
 * furthest right; on equal start the longer alias wins, and on equal length
 * the first unit in id order (then the first alias in its list) keeps the
 * match. Alias patterns are compiled once here, so build one resolver per
 * gazetteer load and share it.
 */
export class HierarchicalResolver {
    private readonly compiled = new Map<AdministrativeUnit, readonly CompiledAlias[]>();

    constructor(private readonly gazetteer: Gazetteer, private readonly options: ResolverOptions) {
        const units: AdministrativeUnit[] = [...gazetteer.provinces(), ...gazetteer.districts(), ...gazetteer.wards()];
        for (const unit of units) {
            this.compiled.set(unit, unit.aliasWords.map(word => ({
                word,
                anchored: new RegExp(`${TextUtils.escapeRegExp(word)}(?=${options.specialEnding})`, 'g')
            })));
        }
    }

    resolve(normalized: string): Resolution {
        let address = normalized + this.options.sentinel;
        let provinceInferred = false;

        // Stage 1: province, plain substring search over every province
        let province: Province | undefined;
        const provinceMatch = this.pickRightmost(address, this.gazetteer.provinces(), 'plain');
        if (provinceMatch) {
            province = provinceMatch.unit;
            address = TextUtils.removeAt(address, provinceMatch.index, provinceMatch.word.length);
        }
        address = this.stripDanglingQualifier(address);

        // Stage 2: district, constrained by the province when there is one
        let district: District | undefined;
        const districtMatch = province
            ? this.pickRightmost(address, this.gazetteer.districtsOf(province.id), 'anchored')
            : this.pickRightmost(address, this.gazetteer.districts(), 'plain');
        if (districtMatch) {
            district = districtMatch.unit;
            address = TextUtils.removeAt(address, districtMatch.index, districtMatch.word.length);
            if (!province) {
                province = this.gazetteer.getProvince(district.parentId);
                provinceInferred = province !== undefined;
                logger.log('debug', `Province inferred from district ${district.id}`, { province_id: district.parentId });
            }
        }

        // Stage 3: ward, only under a resolved district
        let ward: Ward | undefined;
        if (district) {
            const wardMatch = this.pickRightmost(address, this.gazetteer.wardsOf(district.id), 'anchored');
            if (wardMatch) {
                ward = wardMatch.unit;
                address = TextUtils.removeAt(address, wardMatch.index, wardMatch.word.length);
            }
        }

        return { address, province, district, ward, provinceInferred };
    }

    pickRightmost<T extends AdministrativeUnit>(address: string, candidates: readonly T[], mode: MatchMode): AliasMatch<T> | undefined {
        let best: AliasMatch<T> | undefined;

        for (const unit of candidates) {
            for (const alias of this.compiled.get(unit) ?? []) {
                const index = mode === 'plain'
                    ? address.lastIndexOf(alias.word)
                    : TextUtils.lastIndexOfRegex(address, alias.anchored);
                if (index < 0) continue;

                if (!best || index > best.index || (index === best.index && alias.word.length > best.word.length)) {
                    best = { unit, word: alias.word, index };
                }
            }
        }

        return best;
    }

    // "... Thanh Pho ," -> "... ,"
    private stripDanglingQualifier(address: string): string {
        for (const qualifier of this.options.danglingQualifiers) {
            if (address.endsWith(qualifier)) {
                return address.slice(0, address.length - qualifier.length) + this.options.sentinel;
            }
        }
        return address;
    }
}
