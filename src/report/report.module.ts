import { Module } from '@nestjs/common';
import { ReportController } from './report.controller';
import { ReportService } from './report.service';
import { ReportComposerService } from './report-composer.service';
import { RadarService } from './radar.service';
import { CHART_CAPABILITY } from './chart-capability';

@Module({
  controllers: [ReportController],
  providers: [
    ReportService,
    ReportComposerService,
    RadarService,
    { provide: CHART_CAPABILITY, useExisting: RadarService },
  ],
  exports: [ReportService],
})
export class ReportModule {}
