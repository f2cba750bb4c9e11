import { AddressNormalizer } from '../src/modules/normalizer';
import { loadConfig, toNormalizerDictionaries } from '../src/config';
import { InvalidInputError } from '../src/utils/errors';

describe('AddressNormalizer', () => {
    const normalizer = new AddressNormalizer(toNormalizerDictionaries(loadConfig()));

    describe('full pipeline', () => {
        test('expands abbreviations and city aliases', () => {
            expect(normalizer.normalize('123 Nguyen Van Cu, Q.1, Tp.HCM')).toBe('123 Nguyen Van Cu Q1 Tp Ho Chi Minh');
        });

        test('strips diacritics and folds "Quan N"', () => {
            expect(normalizer.normalize('Số 5 Lê Lợi, Bến Nghé, Quận 1, Thành phố Hồ Chí Minh'))
                .toBe('So 5 Le Loi Ben Nghe Q1 Thanh Pho Ho Chi Minh');
        });

        test('normalizes district and ward numbers', () => {
            expect(normalizer.normalize('Phường 07, quận 03')).toBe('P7 Q3');
            expect(normalizer.normalize('f02 q.5')).toBe('P2 Q5');
        });

        test('rewrites dash-joined city names', () => {
            expect(normalizer.normalize('12 Tran Phu, Brvt')).toBe('12 Tran Phu Ba Ria Vung Tau');
            expect(normalizer.normalize('1 Le Loi, Ba Ria-Vung Tau')).toBe('1 Le Loi Ba Ria Vung Tau');
        });

        test('expands city synonyms that only appear once punctuation is gone', () => {
            expect(normalizer.normalize('3 Tran Phu, Br-Vt')).toBe('3 Tran Phu Ba Ria Vung Tau');
            expect(normalizer.normalize('1 Le Loi, S.G')).toBe('1 Le Loi Ho Chi Minh');
        });

                test('title-cases again after punctuation removal', () => {
            expect(normalizer.normalize('Hẻm 5 (kiệt) "Cây Xoài"!')).toBe('Hem 5 Kiet Cay Xoai');
        });

        test('rejects non-string input', () => {
            expect(() => normalizer.normalize(42)).toThrow(InvalidInputError);
            expect(() => normalizer.normalize(null)).toThrow(InvalidInputError);
            expect(() => normalizer.normalize(undefined)).toThrow('Input must be a string');
        });

        test('is idempotent', () => {
            const inputs = [
                '123 Nguyen Van Cu, Q.1, Tp.HCM',
                'Số 5 Lê Lợi, Bến Nghé, Quận 1, Thành phố Hồ Chí Minh',
                'Phường 07, quận 03',
                '12 Tran Phu, Brvt',
                'Hẻm 5 (kiệt) "Cây Xoài"!',
                '3 Tran Phu, Br-Vt',
                '1 Le Loi, S.G'
            ];
            for (const input of inputs) {
                const once = normalizer.normalize(input);
                expect(normalizer.normalize(once)).toBe(once);
            }
        });
    });

    describe('injected dictionaries', () => {
        test('uses the dictionaries it was built with', () => {
            const custom = new AddressNormalizer({
                abbreviations: [['Kp ', ['Kp.']]],
                cityDash: [],
                punctuations: []
            });
            expect(custom.normalize('kp.3 Linh Trung')).toBe('Kp 3 Linh Trung');
        });

        test('still turns periods into spaces with no punctuation set', () => {
            const custom = new AddressNormalizer({ abbreviations: [], cityDash: [], punctuations: [] });
            expect(custom.normalize('a.b')).toBe('A B');
        });
    });

    describe('steps', () => {
        test('cleanDigitDistrict', () => {
            expect(AddressNormalizer.cleanDigitDistrict('quan 12 q 05 Q007')).toBe('Q12 Q5 Q7');
        });

        test('cleanDigitWard', () => {
            expect(AddressNormalizer.cleanDigitWard('phuong 3 f09 P010')).toBe('P3 P9 P10');
        });

        test('addSpaceSeparator', () => {
            expect(AddressNormalizer.addSpaceSeparator('a ,b_c-d')).toBe('A, B C D');
        });

        test('removePunctuation with no pattern only collapses whitespace', () => {
            expect(AddressNormalizer.removePunctuation(' a,  b ', null)).toBe('a, b');
        });
    });
});
