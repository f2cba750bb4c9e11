// Vietnamese letters NFD decomposition does not reduce to a plain base letter.
const VIETNAMESE_BASE_LETTERS: ReadonlyArray<[string, string]> = [
    ['a', 'àáạảãâầấậẩẫăằắặẳẵ'],
    ['A', 'ÀÁẠẢÃĂẰẮẶẲẴÂẦẤẬẨẪ'],
    ['e', 'èéẹẻẽêềếệểễ'],
    ['E', 'ÈÉẸẺẼÊỀẾỆỂỄ'],
    ['o', 'òóọỏõôồốộổỗơờớợởỡ'],
    ['O', 'ÒÓỌỎÕÔỒỐỘỔỖƠỜỚỢỞỠ'],
    ['i', 'ìíịỉĩ'],
    ['I', 'ÌÍỊỈĨ'],
    ['u', 'ùúụủũưừứựửữ'],
    ['U', 'ƯỪỨỰỬỮÙÚỤỦŨ'],
    ['y', 'ỳýỵỷỹ'],
    ['Y', 'ỲÝỴỶỸ'],
    ['d', 'đ'],
    ['D', 'Đ'],
];

const COMBINING_MARKS = /[\u0300-\u036f]/g;

export class TextUtils {

    static capitalize(word: string): string {
        if (!word) return word;
        return word.charAt(0).toUpperCase() + word.slice(1).toLowerCase();
    }

    /**
     * Title-cases every whitespace-delimited token. Splitting on whitespace
     * also trims and collapses, so the output is single-spaced.
     */
    static initCapWords(text: string): string {
        if (!text) return text;
        return text.split(/\s+/).filter(w => w.length > 0).map(w => this.capitalize(w)).join(' ');
    }

    static removeAccent(text: string): string {
        let out = text.normalize('NFD').replace(COMBINING_MARKS, '');
        for (const [base, accented] of VIETNAMESE_BASE_LETTERS) {
            for (const ch of accented) {
                out = out.split(ch).join(base);
            }
        }
        return out;
    }

    static removeSpareSpace(text: string): string {
        return text.trim().replace(/\s+/g, ' ');
    }

    // '-' is escaped too so the result is safe inside a character class.
    static escapeRegExp(text: string): string {
        return text.replace(/[.*+?^${}()|[\]\\\-]/g, '\\$&');
    }

    /**
     * Start index of the last non-overlapping match, or -1.
     * The pattern must carry the `g` flag; matchAll works on a clone, so a
     * shared compiled pattern is never mutated.
     */
    static lastIndexOfRegex(text: string, pattern: RegExp | null): number {
        if (!pattern) return -1;
        let last = -1;
        for (const match of text.matchAll(pattern)) {
            last = match.index ?? last;
        }
        return last;
    }

    static removeAt(text: string, index: number, length: number): string {
        if (index < 0 || length <= 0) return text;
        return text.slice(0, index) + text.slice(index + length);
    }

    static replaceLastOccurrence(target: string, substr: string, replacement: string): string {
        if (!substr) return target;
        const lastIndex = target.lastIndexOf(substr);
        if (lastIndex === -1) return target;
        return target.slice(0, lastIndex) + replacement + target.slice(lastIndex + substr.length);
    }
}
