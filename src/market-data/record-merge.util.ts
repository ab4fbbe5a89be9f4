import { SymbolNotFoundError } from '../common/errors';
import {
    ProviderName,
    ProviderRecord,
    RECORD_FIELDS,
    RecordField,
    StockDetail,
} from './market-data.types';

export function isMissing(value: unknown): boolean {
    if (value === undefined || value === null) return true;
    if (typeof value === 'string') return value.trim() === '';
    if (typeof value === 'number') return Number.isNaN(value);
    return false;
}

function copyField<K extends RecordField>(target: ProviderRecord, source: ProviderRecord, field: K): void {
    target[field] = source[field];
}

export interface MergeResult {
    record: ProviderRecord;
    filled: RecordField[];
}

/**
 * Copies from `supplement` only the fields `base` lacks. A value already in
 * `base` is never replaced, so the first provider consulted wins conflicts.
 */
export function fillMissing(base: ProviderRecord, supplement: ProviderRecord): MergeResult {
    const record: ProviderRecord = { ...base };
    const filled: RecordField[] = [];
    for (const field of RECORD_FIELDS) {
        if (isMissing(record[field]) && !isMissing(supplement[field])) {
            copyField(record, supplement, field);
            filled.push(field);
        }
    }
    return { record, filled };
}

export function hasSectorAndIndustry(record: ProviderRecord): boolean {
    return !isMissing(record.sector) && !isMissing(record.industry);
}

function orNull<T>(value: T | undefined): T | null {
    return isMissing(value) || value === undefined ? null : value;
}

export function toStockDetail(symbol: string, record: ProviderRecord, sources: ProviderName[]): StockDetail {
    const price = record.price;
    if (price === undefined || isMissing(price)) {
        throw new SymbolNotFoundError(symbol);
    }

    const previousClose = orNull(record.previousClose);
    let dayChange = orNull(record.dayChange);
    let dayChangePct = orNull(record.dayChangePct);
    if (previousClose !== null) {
        dayChange ??= price - previousClose;
        if (previousClose > 0) dayChangePct ??= ((price - previousClose) / previousClose) * 100;
    }

    const detail: StockDetail = {
        symbol,
        name: orNull(record.name),
        price,
        previousClose,
        dayChange,
        dayChangePct,
        open: orNull(record.open),
        dayHigh: orNull(record.dayHigh),
        dayLow: orNull(record.dayLow),
        volume: orNull(record.volume),
        peRatio: orNull(record.peRatio),
        marketCap: orNull(record.marketCap),
        beta: orNull(record.beta),
        dividendYield: orNull(record.dividendYield),
        week52High: orNull(record.week52High),
        week52Low: orNull(record.week52Low),
        averageVolume: orNull(record.averageVolume),
        sector: orNull(record.sector),
        industry: orNull(record.industry),
        bidPrice: orNull(record.bidPrice),
        bidSize: orNull(record.bidSize),
        askPrice: orNull(record.askPrice),
        askSize: orNull(record.askSize),
        afterHoursPrice: orNull(record.afterHoursPrice),
        tradingHalted: orNull(record.tradingHalted),
        sources,
        unavailableFields: [],
    };

    for (const field of RECORD_FIELDS) {
        if (field !== 'price' && detail[field] === null) {
            detail.unavailableFields.push(field);
        }
    }
    return detail;
}
