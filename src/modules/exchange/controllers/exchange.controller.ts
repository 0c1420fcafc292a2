import { Controller, Get, HttpCode, HttpStatus, Post, Query, Res, UseInterceptors } from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import type { Response } from 'express';
import { getTraceId } from '../../../common/logger/request-context';
import { RequestMetricsInterceptor } from '../../metrics/interceptors/request-metrics.interceptor';
import { ConvertQueryDto } from '../dto/convert-query.dto';
import { Currency } from '../enums/currency.enum';
import { ConversionResult } from '../interfaces/conversion-result.interface';
import { ConversionService } from '../services/conversion.service';

export const SERVICE_NAME = 'Currency Exchange API';
export const SERVICE_VERSION = '1.0.0';

@ApiTags('Exchange')
@Controller()
export class ExchangeController {
  constructor(private readonly conversionService: ConversionService) {}

  @Get()
  @ApiOperation({ summary: 'Service index with example endpoints' })
  index() {
    return {
      message: SERVICE_NAME,
      version: SERVICE_VERSION,
      endpoints: {
        convert: '/convert?from=EUR&to=USD&amount=100',
        currencies: '/currencies',
        clearCache: '/cache/clear',
        metrics: '/metrics',
        health: '/health',
      },
    };
  }

  @Get('convert')
  @UseInterceptors(RequestMetricsInterceptor)
  @ApiOperation({ summary: 'Convert an amount between two currencies' })
  async convert(
    @Query() query: ConvertQueryDto,
    @Res({ passthrough: true }) res: Response,
  ): Promise<{ conversion: ConversionResult }> {
    // Stop waiting on the rate provider once the client has gone
    const controller = new AbortController();
    const onClose = () => {
      if (!res.writableEnded) {
        controller.abort();
      }
    };
    res.once('close', onClose);

    try {
      const conversion = await this.conversionService.convert(query.from, query.to, query.amount, {
        traceId: getTraceId(),
        signal: controller.signal,
      });
      return { conversion };
    } finally {
      res.off('close', onClose);
    }
  }

  @Get('currencies')
  @ApiOperation({ summary: 'List supported currency codes' })
  listCurrencies(): { supportedCurrencies: Currency[]; count: number } {
    const supportedCurrencies = this.conversionService.listSupportedCurrencies();
    return { supportedCurrencies, count: supportedCurrencies.length };
  }

  @Post('cache/clear')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Drop every cached exchange rate' })
  clearCache(): { message: string; cleared: number } {
    const cleared = this.conversionService.clearCache();
    return { message: 'Exchange rate cache cleared', cleared };
  }
}
