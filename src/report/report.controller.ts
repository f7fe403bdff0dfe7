import { Body, Controller, Post, Res, UseGuards } from '@nestjs/common';
import { Throttle } from '@nestjs/throttler';
import type { Response } from 'express';
import { AdminGuard } from '../common/guards/admin.guard';
import { SanitizeService } from '../common/sanitize/sanitize.service';
import { ReportService } from './report.service';
import { GenerateReportDto } from './dto/generate-report.dto';

@Controller('report')
@UseGuards(AdminGuard)
export class ReportController {
  constructor(
    private reportService: ReportService,
    private sanitize: SanitizeService,
  ) {}

  @Post('generate')
  @Throttle({ default: { ttl: 60_000, limit: 10 } })
  async generate(@Body() dto: GenerateReportDto, @Res() res: Response) {
    const { document } = await this.reportService.generate({
      company: this.sanitize.sanitize(dto.company),
      answers: dto.answers,
      branding: this.reportService.toBranding(dto.branding),
    });

    res.attachment(document.filename);
    res.set({
      'Content-Type': document.contentType,
      'Content-Length': String(document.bytes.length),
    });
    res.send(document.bytes);
  }
}
