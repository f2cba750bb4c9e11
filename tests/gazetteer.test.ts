import fs from 'fs';
import os from 'os';
import path from 'path';
import { Gazetteer, GazetteerData, compareUnitIds } from '../src/modules/gazetteer';
import { loadGazetteer } from '../src/modules/gazetteer/loader';
import { ConfigurationError } from '../src/utils/errors';

const FIXTURE = path.join(__dirname, 'fixtures/gazetteer.json');

describe('Gazetteer', () => {
    const gazetteer = loadGazetteer(FIXTURE);

    test('indexes every level', () => {
        expect(gazetteer.getStats()).toEqual({ provinces: 4, districts: 6, wards: 7 });
    });

    test('stringifies numeric ids', () => {
        expect(gazetteer.getProvince('48')?.name).toBe('Da Nang');
        expect(gazetteer.getDistrict('492')?.parentId).toBe('48');
    });

    test('iterates in id order regardless of file order', () => {
        expect(gazetteer.provinces().map(p => p.id)).toEqual(['01', '48', '77', '79']);
        expect(gazetteer.districtsOf('79').map(d => d.id)).toEqual(['760', '770', '771']);
        expect(gazetteer.wardsOf('760').map(w => w.id)).toEqual(['26734', '26737', '26740', '26743']);
    });

    test('returns nothing for unknown ids', () => {
        expect(gazetteer.getProvince('99')).toBeUndefined();
        expect(gazetteer.getWard('nope')).toBeUndefined();
        expect(gazetteer.districtsOf('99')).toEqual([]);
        expect(gazetteer.wardsOf('nope')).toEqual([]);
    });

    test('freezes units and their alias lists', () => {
        const ward = gazetteer.getWard('26737');
        expect(Object.isFrozen(ward)).toBe(true);
        expect(Object.isFrozen(ward?.aliasWords)).toBe(true);
        expect(() => Reflect.apply(Array.prototype.push, ward?.aliasWords, ['Dakao 2'])).toThrow(TypeError);
        expect(gazetteer.getWard('26737')?.aliasWords).toEqual(['Da Kao', 'Dakao']);
    });

        test('compareUnitIds orders numerically', () => {
        expect(['10', '9', '001'].sort(compareUnitIds)).toEqual(['001', '9', '10']);
    });

    describe('construction errors', () => {
        const base: GazetteerData = {
            provinces: [{ id: '1', name: 'Tinh A', aliasWords: ['Tinh A'] }],
            districts: [{ id: '10', name: 'Huyen A', aliasWords: ['Huyen A'], parentId: '1' }],
            wards: []
        };

        test('rejects a district with an unknown province', () => {
            const data = { ...base, districts: [{ id: '10', name: 'Huyen A', aliasWords: ['Huyen A'], parentId: '2' }] };
            expect(() => Gazetteer.fromData(data)).toThrow(ConfigurationError);
            expect(() => Gazetteer.fromData(data)).toThrow('district "10" references unknown parent "2"');
        });

        test('rejects a ward with an unknown district', () => {
            const data = { ...base, wards: [{ id: '100', name: 'Xa A', aliasWords: ['Xa A'], parentId: '11' }] };
            expect(() => Gazetteer.fromData(data)).toThrow('ward "100" references unknown parent "11"');
        });

        test('rejects duplicate ids', () => {
            const data = { ...base, provinces: [...base.provinces, { id: 1, name: 'Tinh B', aliasWords: [] }] };
            expect(() => Gazetteer.fromData(data)).toThrow('Duplicate province id "1"');
        });

        test('rejects malformed alias lists', () => {
            const data = { ...base, provinces: [{ id: '1', name: 'Tinh A', aliasWords: [''] }] };
            expect(() => Gazetteer.fromData(data)).toThrow(/^Invalid gazetteer data: provinces\.0\.aliasWords\.0/);
        });
    });

    describe('loader', () => {
        let dir: string;

        beforeAll(() => {
            dir = fs.mkdtempSync(path.join(os.tmpdir(), 'gazetteer-'));
        });

        afterAll(() => {
            fs.rmSync(dir, { recursive: true, force: true });
        });

        test('reads YAML files', () => {
            const file = path.join(dir, 'small.yaml');
            fs.writeFileSync(file, [
                'provinces:',
                '  - { id: 1, name: Tinh A, aliasWords: [Tinh A] }',
                'districts: []',
                'wards: []'
            ].join('\n'));
            expect(loadGazetteer(file).getProvince('1')?.aliasWords).toEqual(['Tinh A']);
        });

        test('fails on a missing file', () => {
            expect(() => loadGazetteer(path.join(dir, 'missing.json'))).toThrow(/^Cannot read gazetteer file/);
        });

        test('fails on malformed JSON', () => {
            const file = path.join(dir, 'broken.json');
            fs.writeFileSync(file, '{ "provinces": [');
            expect(() => loadGazetteer(file)).toThrow(/^Malformed gazetteer file/);
        });
    });
});
