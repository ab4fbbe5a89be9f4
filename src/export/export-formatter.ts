import * as XLSX from 'xlsx';
import { toSnapshotDto } from '../portfolio/dto';
import { sectorOf } from '../portfolio/portfolio-aggregator';
import { Holding, PortfolioSnapshot } from '../portfolio/portfolio.types';

export const EXPORT_FORMATS = ['json', 'csv', 'text'] as const;
export type ExportFormat = (typeof EXPORT_FORMATS)[number];

export interface ExportedFile {
    body: string;
    contentType: string;
    filename: string;
}

const FILE_BASENAME = 'portfolio';

export function isExportFormat(value: string): value is ExportFormat {
    return EXPORT_FORMATS.some((format) => format === value);
}

const moneyFormat = new Intl.NumberFormat('en-US', {
    minimumFractionDigits: 2,
    maximumFractionDigits: 2,
});

/** `$1,234.50`, `-$12.00`, or `n/a` */
export function formatMoney(value: number | null): string {
    if (value === null) return 'n/a';
    const formatted = `$${moneyFormat.format(Math.abs(value))}`;
    return value < 0 ? `-${formatted}` : formatted;
}

export function formatPercent(value: number | null): string {
    return value === null ? 'n/a' : `${value.toFixed(2)}%`;
}

type Cell = string | number | null;

const CSV_HEADER: Cell[] = [
    'Symbol',
    'Company',
    'Sector',
    'Industry',
    'Current Price',
    'Day Change',
    'Day Change $',
    'Shares',
    'Avg Buy Price',
    'Cost Basis',
    'Market Value',
    'Gain/Loss',
    'Gain/Loss %',
    '% of Portfolio',
    'Quote Status',
];

function dayChangeValue(holding: Holding): number | null {
    return holding.dayChange === null ? null : holding.quantity * holding.dayChange;
}

function toCsv(snapshot: PortfolioSnapshot): string {
    const rows: Cell[][] = [CSV_HEADER];
    for (const h of snapshot.holdings) {
        rows.push([
            h.symbol,
            h.name,
            sectorOf(h),
            h.industry,
            h.currentPrice,
            h.dayChange,
            dayChangeValue(h),
            h.quantity,
            h.averageCost,
            h.costBasis,
            h.marketValue,
            h.gainLossAbs,
            h.gainLossPct,
            h.allocationPct,
            h.quoteStatus,
        ]);
    }
    rows.push(
        [],
        ['Total Portfolio Value', snapshot.totalValue],
        ['Stock Value', snapshot.stockValue],
        ['Cash', snapshot.cash],
        ['Buying Power', snapshot.buyingPower],
        ['Total Gain/Loss', snapshot.totalGainLoss],
        ['Total Gain/Loss %', snapshot.totalGainLossPct],
        ["Today's Change", snapshot.todayChange],
    );

    const sheet = XLSX.utils.aoa_to_sheet(rows);
    return XLSX.utils.sheet_to_csv(sheet, { rawNumbers: true, strip: true });
}

function toText(snapshot: PortfolioSnapshot, exportedAt: Date): string {
    const lines = [
        'PORTFOLIO EXPORT',
        `Exported: ${exportedAt.toISOString()}`,
        '',
        '=== PORTFOLIO SUMMARY ===',
        `Total Portfolio Value: ${formatMoney(snapshot.totalValue)}`,
        `Stock Value: ${formatMoney(snapshot.stockValue)}`,
        `Cash: ${formatMoney(snapshot.cash)}`,
        `Buying Power: ${formatMoney(snapshot.buyingPower)}`,
        `Total Gain/Loss: ${formatMoney(snapshot.totalGainLoss)} (${formatPercent(snapshot.totalGainLossPct)})`,
        `Today's Change: ${formatMoney(snapshot.todayChange)}`,
        `Number of Holdings: ${snapshot.holdings.length}`,
        '',
        '=== SECTORS ===',
        ...snapshot.sectors.map((s) => `${s.sector}: ${formatMoney(s.marketValue)} (${formatPercent(s.percentage)})`),
        '',
        '=== HOLDINGS ===',
    ];

    for (const h of snapshot.holdings) {
        lines.push(
            '',
            h.name ? `${h.symbol} (${h.name})` : h.symbol,
            `  Sector: ${sectorOf(h)} | Industry: ${h.industry ?? 'Unknown'}`,
            `  Current Price: ${formatMoney(h.currentPrice)} | Day Change: ${formatMoney(dayChangeValue(h))}`,
            `  Shares: ${h.quantity.toFixed(4)} | Avg Buy Price: ${formatMoney(h.averageCost)}`,
            `  Cost Basis: ${formatMoney(h.costBasis)} | Market Value: ${formatMoney(h.marketValue)}`,
            `  Gain/Loss: ${formatMoney(h.gainLossAbs)} (${formatPercent(h.gainLossPct)})`,
            `  Portfolio Allocation: ${formatPercent(h.allocationPct)}`,
        );
        if (h.quoteError) {
            lines.push(`  Quote unavailable: ${h.quoteError}`);
        }
    }

    return `${lines.join('\n')}\n`;
}

/** Serializes a snapshot for download. Every format carries the same total value. */
export function formatExport(snapshot: PortfolioSnapshot, format: ExportFormat, exportedAt: Date = new Date()): ExportedFile {
    switch (format) {
        case 'json':
            return {
                body: JSON.stringify({ ...toSnapshotDto(snapshot), exported_at: exportedAt.toISOString() }, null, 2),
                contentType: 'application/json',
                filename: `${FILE_BASENAME}.json`,
            };
        case 'csv':
            return {
                body: toCsv(snapshot),
                contentType: 'text/csv',
                filename: `${FILE_BASENAME}.csv`,
            };
        case 'text':
            return {
                body: toText(snapshot, exportedAt),
                contentType: 'text/plain',
                filename: `${FILE_BASENAME}.txt`,
            };
    }
}
