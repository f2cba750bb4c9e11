import { z } from 'zod';
import { District, Province, UnitLevel, Ward } from '../../types';
import { ConfigurationError } from '../../utils/errors';

const UnitIdSchema = z.union([z.string().trim().min(1), z.number().int()]).transform(String);

const UnitSchema = z.object({
    id: UnitIdSchema,
    name: z.string().trim().min(1),
    aliasWords: z.array(z.string().min(1)).default([]),
});

const ChildUnitSchema = UnitSchema.extend({
    parentId: UnitIdSchema,
});

export const GazetteerDataSchema = z.object({
    provinces: z.array(UnitSchema),
    districts: z.array(ChildUnitSchema),
    wards: z.array(ChildUnitSchema),
});

export type GazetteerData = z.input<typeof GazetteerDataSchema>;

/** Natural ordering: "2" < "10", then plain code-unit comparison. */
export function compareUnitIds(a: string, b: string): number {
    return a.localeCompare(b, 'en', { numeric: true }) || (a < b ? -1 : a > b ? 1 : 0);
}

function indexById<T extends { id: string }>(units: T[], level: UnitLevel): Map<string, T> {
    const sorted = [...units].sort((a, b) => compareUnitIds(a.id, b.id));
    const map = new Map<string, T>();
    for (const unit of sorted) {
        if (map.has(unit.id)) {
            throw new ConfigurationError(`Duplicate ${level.toLowerCase()} id "${unit.id}"`, { level, id: unit.id });
        }
        map.set(unit.id, unit);
    }
    return map;
}

function groupByParent<T extends { id: string; parentId: string }>(
    children: ReadonlyMap<string, T>,
    parents: ReadonlyMap<string, unknown>,
    level: UnitLevel
): Map<string, string[]> {
    const groups = new Map<string, string[]>();
    for (const parentId of parents.keys()) groups.set(parentId, []);

    // children are already in id order, so every group is too
    for (const child of children.values()) {
        const group = groups.get(child.parentId);
        if (!group) {
            throw new ConfigurationError(
                `${level.toLowerCase()} "${child.id}" references unknown parent "${child.parentId}"`,
                { level, id: child.id, parent_id: child.parentId }
            );
        }
        group.push(child.id);
    }
    return groups;
}

/**
 * Immutable three-level reference data; units and their alias lists are
 * frozen, so resolutions can hand them out directly. Built once per load; every
 * iteration it exposes is in id-ascending order so tied matches resolve the
 * same way regardless of how the source file was ordered.
 */
export class Gazetteer {
    private readonly districtIdsByProvince: ReadonlyMap<string, readonly string[]>;
    private readonly wardIdsByDistrict: ReadonlyMap<string, readonly string[]>;

    private constructor(
        private readonly provinceMap: ReadonlyMap<string, Province>,
        private readonly districtMap: ReadonlyMap<string, District>,
        private readonly wardMap: ReadonlyMap<string, Ward>
    ) {
        this.districtIdsByProvince = groupByParent(districtMap, provinceMap, UnitLevel.DISTRICT);
        this.wardIdsByDistrict = groupByParent(wardMap, districtMap, UnitLevel.WARD);
    }

    static fromData(raw: unknown): Gazetteer {
        const parsed = GazetteerDataSchema.safeParse(raw);
        if (!parsed.success) {
            const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
            throw new ConfigurationError(`Invalid gazetteer data: ${issues.join('; ')}`, { issues });
        }
        const data = parsed.data;

        const provinces = indexById(
            data.provinces.map((p): Province => Object.freeze<Province>({ ...p, aliasWords: Object.freeze([...p.aliasWords]), level: UnitLevel.PROVINCE })),
            UnitLevel.PROVINCE
        );
        const districts = indexById(
            data.districts.map((d): District => Object.freeze<District>({ ...d, aliasWords: Object.freeze([...d.aliasWords]), level: UnitLevel.DISTRICT })),
            UnitLevel.DISTRICT
        );
        const wards = indexById(
            data.wards.map((w): Ward => Object.freeze<Ward>({ ...w, aliasWords: Object.freeze([...w.aliasWords]), level: UnitLevel.WARD })),
            UnitLevel.WARD
        );

        return new Gazetteer(provinces, districts, wards);
    }

    getProvince(id: string): Province | undefined {
        return this.provinceMap.get(id);
    }

    getDistrict(id: string): District | undefined {
        return this.districtMap.get(id);
    }

    getWard(id: string): Ward | undefined {
        return this.wardMap.get(id);
    }

    provinces(): Province[] {
        return Array.from(this.provinceMap.values());
    }

    districts(): District[] {
        return Array.from(this.districtMap.values());
    }

    wards(): Ward[] {
        return Array.from(this.wardMap.values());
    }

    districtsOf(provinceId: string): District[] {
        const ids = this.districtIdsByProvince.get(provinceId) ?? [];
        return ids.flatMap(id => this.districtMap.get(id) ?? []);
    }

    wardsOf(districtId: string): Ward[] {
        const ids = this.wardIdsByDistrict.get(districtId) ?? [];
        return ids.flatMap(id => this.wardMap.get(id) ?? []);
    }

    getStats(): { provinces: number; districts: number; wards: number } {
        return {
            provinces: this.provinceMap.size,
            districts: this.districtMap.size,
            wards: this.wardMap.size
        };
    }
}
