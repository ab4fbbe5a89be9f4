import { BadRequestException, Controller, Get, Query, Res, UseGuards } from '@nestjs/common';
import { Response } from 'express';
import { SessionGuard } from '../brokerage/session.guard';
import { ExportFormat, formatExport, isExportFormat } from '../export/export-formatter';
import { PortfolioSnapshotDto, toSnapshotDto } from './dto';
import { PortfolioService } from './portfolio.service';

function isSingleValue(value: unknown): value is string | undefined {
    return value === undefined || typeof value === 'string';
}

@Controller()
@UseGuards(SessionGuard)
export class PortfolioController {
    constructor(private readonly portfolioService: PortfolioService) { }

    @Get('portfolio')
    async getPortfolio(): Promise<PortfolioSnapshotDto> {
        return toSnapshotDto(await this.portfolioService.getSnapshot());
    }

    @Get('export-portfolio')
    async exportPortfolio(
        @Query('format') format: unknown,
        @Query('text') text: unknown,
        @Res({ passthrough: true }) res: Response,
    ): Promise<string> {
        const requested = this.resolveFormat(format, text);
        const exported = formatExport(await this.portfolioService.getSnapshot(), requested);

        res.setHeader('Content-Type', exported.contentType);
        res.setHeader('Content-Disposition', `attachment; filename=${exported.filename}`);
        return exported.body;
    }

    private resolveFormat(format: unknown, text: unknown): ExportFormat {
        if (!isSingleValue(format) || !isSingleValue(text)) {
            throw new BadRequestException('Export parameters must be single values');
        }
        const requested = (format ?? 'json').trim().toLowerCase();
        if (!isExportFormat(requested)) {
            throw new BadRequestException(`Unknown export format: ${requested}`);
        }
        // Older clients ask for the text summary as json with text=true
        if (requested === 'json' && text?.toLowerCase() === 'true') {
            return 'text';
        }
        return requested;
    }
}
