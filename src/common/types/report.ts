import type { Insights, ScoreResult } from './scoring';

export interface BrandingContext {
  brandName: string;
  partnerName?: string;
  primaryLogo?: Buffer;
  partnerLogo?: Buffer;
}

export interface ReportInput {
  company: string;
  branding: BrandingContext;
  scores: ScoreResult;
  insights: Insights;
  generatedAt?: Date;
}

export interface ReportDocument {
  bytes: Buffer;
  filename: string;
  contentType: string;
}
