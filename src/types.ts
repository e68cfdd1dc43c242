// TypeScript interfaces for the county irrigation actor

export interface IrrigationInput {
    apiKey?: string;
    commodity?: string;
    minYear?: number;
    state?: string;
    domainCategory?: string;
    extraFilters?: Record<string, string>;
    timeoutSecs?: number;
    baseUrl?: string;
    checkCount?: boolean;
}

// Validated request parameters for the Quick Stats API
export interface QueryParameters {
    readonly apiKey: string;
    readonly baseUrl: string;
    readonly commodity: string;
    readonly minYear: number;
    readonly regionFilter?: string;
    readonly extraFilters: Readonly<Record<string, string>>;
    readonly timeoutMs: number;
}

// One Quick Stats record; every value arrives as text
export type RawRecord = Readonly<Record<string, string>>;

// One row per county and year, ready for charting or a spatial join on regionId
export type NormalizedRow = {
    countyCode: string;
    countyName: string;
    stateCode: string;
    stateName: string;
    year: number;
    irrigatedAcres: number;
    totalAcres: number;
    percentIrrigated: number;
    regionId: string;
};

export interface NormalizeOptions {
    domainCategory?: string;
}

// Error item pushed to the dataset when a run fails
export type OutputError = {
    error: string;
    errorType: string;
    statusCode?: number;
    errorMessage: string;
    scrapedTimestamp: string;
};
