import { Body, Controller, Get, HttpCode, Post, Query, Res } from '@nestjs/common';
import type { ServerResponse } from 'node:http';
import { Throttle } from '@nestjs/throttler';
import { RequestSignal } from '../common/request-signal.decorator';
import { ChangeBanDto } from './dto/change-ban.dto';
import { GetRateDto } from './dto/get-rate.dto';
import { TimelineQueryDto } from './dto/timeline-query.dto';
import { FxService } from './fx.service';

@Controller('currency')
export class FxController {
  constructor(private readonly fx: FxService) {}

  @Get('available')
  available(@RequestSignal() signal: AbortSignal) {
    return this.fx.getAvailableCurrencies(signal);
  }

  @Post('change-ban')
  @HttpCode(200)
  @Throttle({ default: { limit: 20, ttl: 60_000 } })
  async changeBan(@Body() body: ChangeBanDto, @RequestSignal() signal: AbortSignal) {
    await this.fx.changeBanStatus(body.currency, body.banned, signal);
    return { ok: true };
  }

  // Only a rate is cacheable downstream; faults go out without the header.
  @Get('current-rate')
  async currentRate(
    @Query() q: GetRateDto,
    @RequestSignal() signal: AbortSignal,
    @Res({ passthrough: true }) res: ServerResponse,
  ) {
    const rate = await this.fx.getCurrentRate(q.base, q.second, signal);
    res.setHeader('Cache-Control', 'public, max-age=30, stale-while-revalidate=60');
    return rate;
  }

  // Seeding a timeline can wait on the forecast service for minutes.
  @Get('time-series')
  @Throttle({ default: { limit: 30, ttl: 60_000 } })
  timeSeries(@Query() q: TimelineQueryDto, @RequestSignal() signal: AbortSignal) {
    return this.fx.getTimeline(q.base, q.second, q.start, q.end, signal);
  }
}
