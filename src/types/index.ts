export enum UnitLevel {
    PROVINCE = 'PROVINCE',
    DISTRICT = 'DISTRICT',
    WARD = 'WARD',
}

export type AdministrativeUnit = {
    readonly id: string;
    readonly name: string; // canonical display name
    readonly aliasWords: readonly string[]; // matchable surface forms, in priority order
};

export type Province = AdministrativeUnit & {
    readonly level: UnitLevel.PROVINCE;
};

export type District = AdministrativeUnit & {
    readonly level: UnitLevel.DISTRICT;
    readonly parentId: string; // owning Province
};

export type Ward = AdministrativeUnit & {
    readonly level: UnitLevel.WARD;
    readonly parentId: string; // owning District
};

/** Canonical → variants, applied in declaration order. */
export type ReplacementDictionary = ReadonlyArray<readonly [canonical: string, variants: readonly string[]]>;

export type NormalizerDictionaries = {
    abbreviations: ReplacementDictionary;
    cityDash: ReplacementDictionary;
    punctuations: readonly string[];
};

export type ResolverOptions = {
    specialEnding: string; // regex source of a single-character class
    sentinel: string;
    danglingQualifiers: readonly string[];
};

export type Resolution = {
    address: string; // leftover text, sentinel still attached when nothing consumed it
    province?: Province;
    district?: District;
    ward?: Ward;
    provinceInferred: boolean;
};

export type ResolutionResult = {
    remainder: string;
    province: string;
    district: string;
    ward: string;
};

export type ParsedAddress = {
    input: string;
    normalized: string;
    result: ResolutionResult;
    ids: {
        province?: string;
        district?: string;
        ward?: string;
    };
    province_inferred: boolean;
    formatted: string;
};

export type AddressRow = {
    address: string;
    id?: string;
};

export type OutputRow = {
    id: string;
    address: string;
    normalized: string;
    remainder: string;
    ward: string;
    district: string;
    province: string;
    formatted: string;
    error_message: string;
};
