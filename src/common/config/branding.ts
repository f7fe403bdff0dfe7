export const DEFAULT_BRAND_NAME = 'Channel Readiness Index';

export const REPORT_FONT = 'Aptos';

export const CTA_LINE =
  'Ready to reach a 90+ Channel Readiness score? Book a full GTM Readiness Assessment.';
export const CTA_LINK = 'https://calendly.com/';

export const FOOTER_NOTE = 'Channel Readiness Index | Confidential Diagnostic Summary';

export const DOCX_CONTENT_TYPE =
  'application/vnd.openxmlformats-officedocument.wordprocessingml.document';
