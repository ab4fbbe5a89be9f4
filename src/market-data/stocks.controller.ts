import { BadRequestException, Controller, Get, Param, Query } from '@nestjs/common';
import { QuotesService } from './quotes.service';
import { StockDetailDto, StockSearchResultDto, toSearchResultDto, toStockDetailDto } from './dto';

@Controller()
export class StocksController {
    constructor(private readonly quotesService: QuotesService) { }

    @Get('stock-details/:symbol')
    async getStockDetails(@Param('symbol') symbol: string): Promise<StockDetailDto> {
        return toStockDetailDto(await this.quotesService.getStockDetail(symbol));
    }

    @Get('search-stocks')
    async search(@Query('q') query: unknown): Promise<StockSearchResultDto[]> {
        if (query === undefined) return [];
        if (typeof query !== 'string') {
            throw new BadRequestException('Query parameter q must be a single value');
        }
        if (!query) return [];
        const results = await this.quotesService.searchStocks(query);
        return results.map(toSearchResultDto);
    }
}
