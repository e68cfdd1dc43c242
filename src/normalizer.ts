import { MalformedValueError } from './errors.js';
import type { NormalizedRow, NormalizeOptions, RawRecord } from './types.js';

// Quick Stats field names for each value the normalizer reads
export const RAW_FIELDS = {
    aggregationLevel: 'agg_level_desc',
    unit: 'unit_desc',
    domainCategory: 'domaincat_desc',
    className: 'class_desc',
    value: 'Value',
    stateName: 'state_name',
    stateCode: 'state_fips_code',
    countyCode: 'county_code',
    countyName: 'county_name',
    year: 'year',
    practice: 'prodn_practice_desc',
} as const;

export const DEFAULT_DOMAIN_CATEGORY = '2,000 OR MORE ACRES';

// Sub-classes (e.g. CROPLAND, HARVESTED) repeat the same practices with other figures
export const ALL_CLASSES = 'ALL CLASSES';

// (D): withheld to avoid disclosing individual operations. (Z): less than half the unit shown.
export const REDACTION_SENTINELS: ReadonlySet<string> = new Set(['(D)', '(Z)']);

export const IRRIGATED = 'irrigated';
export const ALL_PRACTICES = 'all_production_practices';

const NUMERIC_PATTERN = /^[-+]?(\d+\.?\d*|\.\d+)$/;

function field(record: RawRecord, name: string): string {
    return record[name] ?? '';
}

/**
 * Parses a Quick Stats value.
 * Returns null for redaction codes, throws MalformedValueError for anything else unparseable.
 */
export function parseValue(raw: string): number | null {
    const trimmed = raw.trim();
    if (REDACTION_SENTINELS.has(trimmed)) {
        return null;
    }

    const digits = trimmed.replace(/,/g, '');
    if (!NUMERIC_PATTERN.test(digits)) {
        throw new MalformedValueError(raw);
    }
    return Number(digits);
}

/**
 * "All Production Practices" -> "all_production_practices"
 */
export function practiceKey(description: string): string {
    return description.trim().toLowerCase().replace(/\s+/g, '_');
}

/**
 * Rounds to one decimal place, ties away from zero (6.25 -> 6.3, -6.25 -> -6.3)
 */
export function roundOneDecimal(value: number): number {
    return (Math.sign(value) * Math.round(Math.abs(value) * 10)) / 10;
}

// Smallest non-empty label wins, so the result does not depend on record order
function pickLabel(current: string, candidate: string): string {
    if (!current) return candidate;
    if (!candidate) return current;
    return candidate < current ? candidate : current;
}

function parseYear(raw: string): number {
    const trimmed = raw.trim();
    if (!/^\d{4}$/.test(trimmed)) {
        throw new MalformedValueError(raw, RAW_FIELDS.year);
    }
    return Number(trimmed);
}

interface CountyYearGroup {
    countyCode: string;
    countyName: string;
    stateCode: string;
    stateName: string;
    year: number;
    regionId: string;
    practices: Map<string, number>;
    conflicting: boolean;
}

/**
 * Turns raw Quick Stats records into one row per county and year.
 *
 * Records outside county acreage for the configured operation-size bucket are dropped,
 * as are sub-class records (class_desc other than ALL CLASSES), redacted values and county/years missing either the irrigated or the
 * all-practices figure. A county/year holding two different figures for the same
 * practice is dropped as ambiguous. Output is sorted by regionId, then year.
 */
export function normalize(records: readonly RawRecord[], options: NormalizeOptions = {}): NormalizedRow[] {
    const bucket = (options.domainCategory ?? DEFAULT_DOMAIN_CATEGORY).toUpperCase();
    const groups = new Map<string, CountyYearGroup>();

    for (const record of records) {
        if (field(record, RAW_FIELDS.aggregationLevel) !== 'COUNTY') continue;
        if (field(record, RAW_FIELDS.unit) !== 'ACRES') continue;
        if (!field(record, RAW_FIELDS.domainCategory).toUpperCase().includes(bucket)) continue;
        const className = field(record, RAW_FIELDS.className);
        if (className && className !== ALL_CLASSES) continue;

        const value = parseValue(field(record, RAW_FIELDS.value));
        if (value === null) continue;

        const year = parseYear(field(record, RAW_FIELDS.year));
        const stateCode = field(record, RAW_FIELDS.stateCode);
        const countyCode = field(record, RAW_FIELDS.countyCode);
        const regionId = `${stateCode}${countyCode}`;
        const key = `${regionId}|${year}`;

        let group = groups.get(key);
        if (!group) {
            group = {
                countyCode,
                countyName: field(record, RAW_FIELDS.countyName),
                stateCode,
                stateName: field(record, RAW_FIELDS.stateName),
                year,
                regionId,
                practices: new Map(),
                conflicting: false,
            };
            groups.set(key, group);
        } else {
            group.countyName = pickLabel(group.countyName, field(record, RAW_FIELDS.countyName));
            group.stateName = pickLabel(group.stateName, field(record, RAW_FIELDS.stateName));
        }

        const practice = practiceKey(field(record, RAW_FIELDS.practice));
        const existing = group.practices.get(practice);
        if (existing !== undefined && existing !== value) {
            group.conflicting = true;
        }
        group.practices.set(practice, value);
    }

    const rows: NormalizedRow[] = [];
    for (const group of groups.values()) {
        if (group.conflicting) continue;

        const irrigatedAcres = group.practices.get(IRRIGATED);
        const totalAcres = group.practices.get(ALL_PRACTICES);
        if (irrigatedAcres === undefined || totalAcres === undefined || totalAcres === 0) continue;

        rows.push({
            countyCode: group.countyCode,
            countyName: group.countyName,
            stateCode: group.stateCode,
            stateName: group.stateName,
            year: group.year,
            irrigatedAcres,
            totalAcres,
            percentIrrigated: roundOneDecimal((irrigatedAcres / totalAcres) * 100),
            regionId: group.regionId,
        });
    }

    return rows.sort((a, b) => a.regionId.localeCompare(b.regionId) || a.year - b.year);
}
