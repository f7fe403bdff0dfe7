import { Module } from '@nestjs/common';
import { APP_FILTER, APP_GUARD } from '@nestjs/core';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { MongooseModule } from '@nestjs/mongoose';
import { ThrottlerModule, ThrottlerGuard } from '@nestjs/throttler';
import { CommonModule } from './common/common.module';
import { AssessmentModule } from './assessment/assessment.module';
import { ReportModule } from './report/report.module';
import { SubmissionModule } from './submission/submission.module';
import { HealthModule } from './health/health.module';
import { ScorecardExceptionFilter } from './common/filters/scorecard-exception.filter';

@Module({
  imports: [
    // Environment config
    ConfigModule.forRoot({ isGlobal: true }),

    // MongoDB connection
    MongooseModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (config: ConfigService) => ({
        uri: config.getOrThrow<string>('MONGODB_URI'),
      }),
    }),

    // Rate limiting (60 requests per minute per IP)
    ThrottlerModule.forRoot([{ ttl: 60_000, limit: 60 }]),

    // Feature modules
    CommonModule,
    AssessmentModule,
    ReportModule,
    SubmissionModule,
    HealthModule,
  ],
  providers: [
    {
      provide: APP_GUARD,
      useClass: ThrottlerGuard,
    },
    {
      provide: APP_FILTER,
      useClass: ScorecardExceptionFilter,
    },
  ],
})
export class AppModule {}
