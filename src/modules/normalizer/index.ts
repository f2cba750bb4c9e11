import { NormalizerDictionaries, ReplacementDictionary } from '../../types';
import { TextUtils } from '../../utils/text';
import { InvalidInputError } from '../../utils/errors';

type CompiledReplacement = {
    pattern: RegExp;
    replacement: string;
};

export class AddressNormalizer {
    private readonly abbreviations: CompiledReplacement[];
    private readonly cityDash: CompiledReplacement[];
    private readonly punctuation: RegExp | null;

    constructor(dictionaries: NormalizerDictionaries) {
        this.abbreviations = AddressNormalizer.compileAbbreviations(dictionaries.abbreviations);
        this.cityDash = AddressNormalizer.compileCityDash(dictionaries.cityDash);
        this.punctuation = AddressNormalizer.compilePunctuation(dictionaries.punctuations);
    }

    /**
     * Canonicalizes a raw address. The order of the steps matters: punctuation
     * removal can join tokens that the digit rules and the city synonyms did
     * not see the first time, so those run again at the end.
     */
    normalize(text: unknown): string {
        if (typeof text !== 'string') {
            throw new InvalidInputError('Input must be a string', text);
        }

        let t = TextUtils.initCapWords(text);
        t = TextUtils.removeAccent(t);
        t = AddressNormalizer.applyReplacements(t, this.abbreviations);
        t = TextUtils.removeSpareSpace(t);
        t = AddressNormalizer.cleanDigitDistrict(t);
        t = AddressNormalizer.cleanDigitWard(t);
        t = AddressNormalizer.applyReplacements(t, this.cityDash);
        t = AddressNormalizer.removePunctuation(t, this.punctuation);
        t = AddressNormalizer.addSpaceSeparator(t);

        t = AddressNormalizer.cleanDigitDistrict(t);
        t = AddressNormalizer.cleanDigitWard(t);
        // "Br-Vt" / "S.G" only become synonyms once punctuation is gone
        t = AddressNormalizer.applyReplacements(t, this.cityDash);
        t = AddressNormalizer.removePunctuation(t, this.punctuation);
        t = AddressNormalizer.addSpaceSeparator(t);

        return t;
    }

    // Tp. / Tp: -> "Tp ", anchored at a token start.
    static compileAbbreviations(dictionary: ReplacementDictionary): CompiledReplacement[] {
        return dictionary.map(([canonical, variants]) => ({
            pattern: new RegExp(`\\b(?:${variants.map(v => TextUtils.escapeRegExp(v)).join('|')})`, 'gi'),
            replacement: TextUtils.capitalize(canonical)
        }));
    }

    static compileCityDash(dictionary: ReplacementDictionary): CompiledReplacement[] {
        return dictionary.map(([canonical, synonyms]) => ({
            pattern: new RegExp(`\\b(?:${synonyms.map(s => TextUtils.escapeRegExp(s)).join('|')})\\b`, 'gi'),
            replacement: canonical
        }));
    }

    static compilePunctuation(punctuations: readonly string[]): RegExp | null {
        if (punctuations.length === 0) return null;
        return new RegExp(`[${punctuations.map(p => TextUtils.escapeRegExp(p)).join('')}]`, 'g');
    }

    static applyReplacements(text: string, replacements: readonly CompiledReplacement[]): string {
        let t = text;
        for (const { pattern, replacement } of replacements) {
            // Function form: the canonical text is inserted literally, `$` included.
            t = t.replace(pattern, () => replacement);
        }
        return t;
    }

    /** "q 1" / "Quan 01" -> "Q1"; leading zeros dropped (Q002 -> Q2). */
    static cleanDigitDistrict(text: string): string {
        return text
            .replace(/\b(q|quan)\s*(\d+)\b/gi, 'Q$2')
            .replace(/\bQ0+(\d+)\b/g, 'Q$1');
    }

    /** "p 1" / "Phuong 01" / "F1" -> "P1". */
    static cleanDigitWard(text: string): string {
        return text
            .replace(/\b(p|phuong)\s*(\d+)\b/gi, 'P$2')
            .replace(/\b[Ff](\d+)\b/g, 'P$1')
            .replace(/\bP0+(\d+)\b/g, 'P$1');
    }

    static removePunctuation(text: string, punctuation: RegExp | null): string {
        if (!punctuation) return TextUtils.removeSpareSpace(text);
        return TextUtils.removeSpareSpace(text.replace(punctuation, ''));
    }

    static addSpaceSeparator(text: string): string {
        let t = text.replace(/\s*,\s*/g, ', ');
        t = t.replace(/[._-]/g, ' ');
        t = TextUtils.removeSpareSpace(t);
        return TextUtils.initCapWords(t);
    }
}
