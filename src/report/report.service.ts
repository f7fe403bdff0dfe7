import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { AnswerSet, Insights, ScoreResult } from '../common/types/scoring';
import type { BrandingContext, ReportDocument } from '../common/types/report';
import { ScoringService } from '../common/scoring/scoring.service';
import { InsightsService } from '../common/insights/insights.service';
import { SanitizeService } from '../common/sanitize/sanitize.service';
import { DEFAULT_BRAND_NAME } from '../common/config/branding';
import { ReportComposerService } from './report-composer.service';
import type { BrandingDto } from './dto/branding.dto';

export interface GenerateReportParams {
  company: string;
  answers: AnswerSet;
  branding: BrandingContext;
  generatedAt?: Date;
}

export interface GeneratedReport {
  scores: ScoreResult;
  insights: Insights;
  document: ReportDocument;
}

@Injectable()
export class ReportService {
  constructor(
    private readonly config: ConfigService,
    private readonly scoring: ScoringService,
    private readonly insights: InsightsService,
    private readonly composer: ReportComposerService,
    private readonly sanitize: SanitizeService,
  ) {}

  /** answers -> scores -> insights -> DOCX */
  async generate(params: GenerateReportParams): Promise<GeneratedReport> {
    const scores = this.scoring.computeScores(params.answers);
    const insights = this.insights.deriveInsights(scores.pillarScores);

    const document = await this.composer.compose({
      company: params.company,
      branding: params.branding,
      scores,
      insights,
      generatedAt: params.generatedAt,
    });

    return { scores, insights, document };
  }

  /** Map request branding to the composer's context; logos arrive base64-encoded. */
  toBranding(dto: BrandingDto | undefined): BrandingContext {
    const brandName =
      this.sanitize.optional(dto?.brandName) ??
      this.config.get<string>('REPORT_BRAND_NAME', DEFAULT_BRAND_NAME);

    return {
      brandName,
      partnerName: this.sanitize.optional(dto?.partnerName),
      primaryLogo: dto?.primaryLogo ? Buffer.from(dto.primaryLogo, 'base64') : undefined,
      partnerLogo: dto?.partnerLogo ? Buffer.from(dto.partnerLogo, 'base64') : undefined,
    };
  }
}
