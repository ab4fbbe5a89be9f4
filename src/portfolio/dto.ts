import { Holding, PortfolioSnapshot, SectorAllocation } from './portfolio.types';

export interface HoldingDto {
    symbol: string;
    name: string | null;
    quantity: number;
    average_cost: number;
    cost_basis: number;
    current_price: number | null;
    previous_close: number | null;
    day_change: number | null;
    market_value: number | null;
    gain_loss_abs: number | null;
    gain_loss_pct: number | null;
    allocation_pct: number;
    sector: string | null;
    industry: string | null;
    quote_status: string;
    quote_error: string | null;
}

export interface SectorAllocationDto {
    sector: string;
    symbols: string[];
    market_value: number;
    percentage: number;
}

export interface PortfolioSnapshotDto {
    holdings: HoldingDto[];
    total_value: number;
    stock_value: number;
    buying_power: number;
    cash: number;
    total_cost_basis: number;
    total_gain_loss: number;
    total_gain_loss_pct: number | null;
    today_change: number;
    sectors: SectorAllocationDto[];
    generated_at: string;
}

export function toHoldingDto(holding: Holding): HoldingDto {
    return {
        symbol: holding.symbol,
        name: holding.name,
        quantity: holding.quantity,
        average_cost: holding.averageCost,
        cost_basis: holding.costBasis,
        current_price: holding.currentPrice,
        previous_close: holding.previousClose,
        day_change: holding.dayChange,
        market_value: holding.marketValue,
        gain_loss_abs: holding.gainLossAbs,
        gain_loss_pct: holding.gainLossPct,
        allocation_pct: holding.allocationPct,
        sector: holding.sector,
        industry: holding.industry,
        quote_status: holding.quoteStatus,
        quote_error: holding.quoteError,
    };
}

function toSectorDto(sector: SectorAllocation): SectorAllocationDto {
    return {
        sector: sector.sector,
        symbols: [...sector.symbols],
        market_value: sector.marketValue,
        percentage: sector.percentage,
    };
}

export function toSnapshotDto(snapshot: PortfolioSnapshot): PortfolioSnapshotDto {
    return {
        holdings: snapshot.holdings.map(toHoldingDto),
        total_value: snapshot.totalValue,
        stock_value: snapshot.stockValue,
        buying_power: snapshot.buyingPower,
        cash: snapshot.cash,
        total_cost_basis: snapshot.totalCostBasis,
        total_gain_loss: snapshot.totalGainLoss,
        total_gain_loss_pct: snapshot.totalGainLossPct,
        today_change: snapshot.todayChange,
        sectors: snapshot.sectors.map(toSectorDto),
        generated_at: snapshot.generatedAt,
    };
}
