import { Body, Controller, Delete, Get, HttpCode, HttpStatus, Param, ParseIntPipe, Post, Put } from '@nestjs/common';
import { CreatePositionDto } from './dto/create-position.dto';
import { DeletePositionResponseDto } from './dto/delete-position-response.dto';
import { PortfolioSummaryResponseDto } from './dto/portfolio-summary-response.dto';
import { PositionResponseDto } from './dto/position-response.dto';
import { PortfolioQueryService } from './portfolio-query.service';
import { PortfolioService } from './portfolio.service';

@Controller('portfolio')
export class PortfolioController {
  constructor(
    private readonly portfolioService: PortfolioService,
    private readonly queryService: PortfolioQueryService,
  ) {}

  /**
   * Lists holdings in insertion order with gain/loss metrics.
   *
   * GET /portfolio/positions
   */
  @Get('positions')
  @HttpCode(HttpStatus.OK)
  getPositions(): PositionResponseDto[] {
    return this.queryService.getPositions();
  }

  /**
   * GET /portfolio/positions/:index
   * @returns 404 when index is out of range
   */
  @Get('positions/:index')
  @HttpCode(HttpStatus.OK)
  getPosition(@Param('index', ParseIntPipe) index: number): PositionResponseDto {
    return this.queryService.getPosition(index);
  }

  /**
   * Adds a holding, persists it and fetches its quote before responding.
   *
   * POST /portfolio/positions
   * @returns 201 with the new position (market fields null if the quote failed)
   */
  @Post('positions')
  @HttpCode(HttpStatus.CREATED)
  async addPosition(@Body() dto: CreatePositionDto): Promise<PositionResponseDto> {
    const index = await this.portfolioService.add(dto);
    return this.queryService.getPosition(index);
  }

  /**
   * Replaces the holding at index and re-fetches its quote.
   *
   * PUT /portfolio/positions/:index
   */
  @Put('positions/:index')
  @HttpCode(HttpStatus.OK)
  async editPosition(
    @Param('index', ParseIntPipe) index: number,
    @Body() dto: CreatePositionDto,
  ): Promise<PositionResponseDto> {
    await this.portfolioService.edit(index, dto);
    return this.queryService.getPosition(index);
  }

  /**
   * DELETE /portfolio/positions/:index
   */
  @Delete('positions/:index')
  @HttpCode(HttpStatus.OK)
  async deletePosition(@Param('index', ParseIntPipe) index: number): Promise<DeletePositionResponseDto> {
    const removed = await this.portfolioService.delete(index);
    return {
      message: `Position ${index} (${removed.ticker}) deleted`,
      ticker: removed.ticker,
      remaining: this.portfolioService.count,
    };
  }

  /**
   * Re-fetches quotes for every holding, one ticker at a time.
   *
   * POST /portfolio/refresh
   */
  @Post('refresh')
  @HttpCode(HttpStatus.OK)
  async refresh(): Promise<PortfolioSummaryResponseDto> {
    await this.portfolioService.refreshAll();
    return this.queryService.getSummary();
  }

  /**
   * Portfolio value, cost and gains.
   *
   * GET /portfolio/summary
   */
  @Get('summary')
  @HttpCode(HttpStatus.OK)
  getSummary(): PortfolioSummaryResponseDto {
    return this.queryService.getSummary();
  }
}
