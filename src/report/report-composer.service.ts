import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  AlignmentType,
  BorderStyle,
  Document,
  ExternalHyperlink,
  ImageRun,
  Packer,
  Paragraph,
  Table,
  TableCell,
  TableRow,
  TextRun,
  WidthType,
} from 'docx';
import { imageSize } from 'image-size';
import type { PillarScore, ScoreResult } from '../common/types/scoring';
import type { BrandingContext, ReportDocument, ReportInput } from '../common/types/report';
import { InsightsService } from '../common/insights/insights.service';
import { roundScore } from '../common/scoring/thresholds';
import { ReportSerializationError } from '../common/errors/scorecard.error';
import {
  CTA_LINE,
  CTA_LINK,
  DOCX_CONTENT_TYPE,
  FOOTER_NOTE,
  REPORT_FONT,
} from '../common/config/branding';
import { CHART_CAPABILITY, ChartCapability } from './chart-capability';

/** Display widths in pixels (96 dpi): 1.6in logos, 4in radar. */
const LOGO_WIDTH_PX = 154;
const RADAR_WIDTH_PX = 384;

/** Font sizes in half-points. */
const SIZE = {
  title: 32,
  headline: 26,
  pillar: 22,
  body: 20,
  footer: 16,
} as const;

const EMBEDDABLE_TYPES = ['png', 'jpg', 'gif', 'bmp'] as const;
type EmbeddableType = (typeof EMBEDDABLE_TYPES)[number];

function isEmbeddable(type: string | undefined): type is EmbeddableType {
  return EMBEDDABLE_TYPES.some((t) => t === type);
}

const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];

const NO_BORDER = { style: BorderStyle.NONE, size: 0, color: 'FFFFFF' } as const;

@Injectable()
export class ReportComposerService {
  private readonly logger = new Logger(ReportComposerService.name);

  constructor(
    private readonly insights: InsightsService,
    @Inject(CHART_CAPABILITY) private readonly chart: ChartCapability,
  ) {}

  /**
   * Build the one-page summary as DOCX bytes.
   *
   * Layout, top to bottom: logo row, title, metadata, headline score, pillar
   * summary (with radar when charting is available), strengths, gaps,
   * recommendations, call to action, footer. Unreadable logos and a failed
   * chart are skipped; only serialization failures are fatal.
   */
  async compose(input: ReportInput): Promise<ReportDocument> {
    const { company, branding, scores, insights } = input;
    const generatedAt = input.generatedAt ?? new Date();
    const children: (Paragraph | Table)[] = [];

    const logoRow = this.buildLogoRow(branding);
    if (logoRow) {
      children.push(logoRow, new Paragraph({}));
    }

    children.push(
      this.line(`${branding.brandName} — Summary Report`, { bold: true, size: SIZE.title }),
      this.line(`${company}${this.coBrandSuffix(branding)} • ${this.formatDate(generatedAt)}`, {
        size: SIZE.body,
      }),
      new Paragraph({}),
      this.line(this.headline(scores), { bold: true, size: SIZE.headline }),
      new Paragraph({}),
      this.line('Pillar Summary', { bold: true }),
    );

    for (const p of scores.pillarScores) {
      children.push(
        this.line(`• ${p.pillar}: ${roundScore(p.score)}`, { size: SIZE.pillar }),
        this.line(this.insights.commentaryFor(p.pillar, p.score), { size: SIZE.body }),
      );
    }

    const radar = await this.buildRadar(scores.pillarScores);
    if (radar) {
      children.push(new Paragraph({ children: [radar], alignment: AlignmentType.CENTER }));
    }

    children.push(
      new Paragraph({}),
      this.line('Top Strengths', { bold: true }),
      ...insights.strengths.map((s) => this.line(`• ${s}`)),
      this.line('Opportunities for Improvement', { bold: true }),
      ...insights.gaps.map((g) => this.line(`• ${g}`)),
      this.line('Top 3 Recommendations (Next 90 Days)', { bold: true }),
      ...insights.recommendations.map((r) => this.line(`• ${r}`)),
      new Paragraph({}),
      new Paragraph({
        children: [
          new TextRun({ text: `${CTA_LINE} `, font: REPORT_FONT, size: SIZE.body }),
          new ExternalHyperlink({
            link: CTA_LINK,
            children: [new TextRun({ text: CTA_LINK, font: REPORT_FONT, style: 'Hyperlink' })],
          }),
        ],
      }),
      new Paragraph({
        alignment: AlignmentType.LEFT,
        children: [new TextRun({ text: FOOTER_NOTE, font: REPORT_FONT, size: SIZE.footer })],
      }),
    );

    let bytes: Buffer;
    try {
      const doc = new Document({
        creator: branding.brandName,
        title: `${branding.brandName} — Summary Report`,
        styles: { default: { document: { run: { font: REPORT_FONT } } } },
        sections: [{ children }],
      });
      bytes = await Packer.toBuffer(doc);
    } catch (err) {
      throw new ReportSerializationError('Failed to serialize summary report', { cause: err });
    }

    const filename = this.filenameFor(company, generatedAt);
    this.logger.log(`Report composed: ${filename} (${(bytes.length / 1024).toFixed(1)} KB)`);

    return { bytes, filename, contentType: DOCX_CONTENT_TYPE };
  }

  headline(scores: ScoreResult): string {
    return `Channel Readiness Score: ${roundScore(scores.overall)}/100 — ${scores.tier}`;
  }

  /** {company without spaces}_ChannelReadiness_{YYYYMMDD_HHMM}.docx, UTC */
  filenameFor(company: string, at: Date): string {
    const pad = (n: number) => String(n).padStart(2, '0');
    const stamp =
      `${at.getUTCFullYear()}${pad(at.getUTCMonth() + 1)}${pad(at.getUTCDate())}` +
      `_${pad(at.getUTCHours())}${pad(at.getUTCMinutes())}`;
    return `${company.replace(/\s+/g, '')}_ChannelReadiness_${stamp}.docx`;
  }

  /** "Mar 07, 2026", UTC */
  formatDate(date: Date): string {
    const day = String(date.getUTCDate()).padStart(2, '0');
    return `${MONTHS[date.getUTCMonth()]} ${day}, ${date.getUTCFullYear()}`;
  }

  private coBrandSuffix(branding: BrandingContext): string {
    return branding.partnerName ? ` (Co-branded with ${branding.partnerName})` : '';
  }

  private line(text: string, opts: { bold?: boolean; size?: number } = {}): Paragraph {
    return new Paragraph({
      children: [new TextRun({ text, bold: opts.bold, size: opts.size, font: REPORT_FONT })],
    });
  }

  private buildLogoRow(branding: BrandingContext): Table | null {
    if (!branding.primaryLogo && !branding.partnerLogo) return null;

    const primary = branding.primaryLogo
      ? this.image(branding.primaryLogo, LOGO_WIDTH_PX, 'primary logo')
      : null;
    const partner = branding.partnerLogo
      ? this.image(branding.partnerLogo, LOGO_WIDTH_PX, 'partner logo')
      : null;
    if (!primary && !partner) return null;

    const cell = (run: ImageRun | null, alignment: (typeof AlignmentType)[keyof typeof AlignmentType]) =>
      new TableCell({
        width: { size: 50, type: WidthType.PERCENTAGE },
        borders: { top: NO_BORDER, bottom: NO_BORDER, left: NO_BORDER, right: NO_BORDER },
        children: [new Paragraph({ alignment, children: run ? [run] : [] })],
      });

    return new Table({
      width: { size: 100, type: WidthType.PERCENTAGE },
      borders: {
        top: NO_BORDER,
        bottom: NO_BORDER,
        left: NO_BORDER,
        right: NO_BORDER,
        insideHorizontal: NO_BORDER,
        insideVertical: NO_BORDER,
      },
      rows: [
        new TableRow({
          children: [cell(primary, AlignmentType.LEFT), cell(partner, AlignmentType.RIGHT)],
        }),
      ],
    });
  }

  private async buildRadar(pillarScores: readonly PillarScore[]): Promise<ImageRun | null> {
    if (!this.chart.isAvailable()) return null;

    let png: Buffer | null;
    try {
      png = await this.chart.renderRadar(pillarScores);
    } catch (err) {
      this.logger.warn(`Radar chart omitted: ${err instanceof Error ? err.message : String(err)}`);
      return null;
    }
    return png ? this.image(png, RADAR_WIDTH_PX, 'radar chart') : null;
  }

  /** Fixed display width, height from the image's own aspect ratio. */
  private image(bytes: Buffer, displayWidth: number, label: string): ImageRun | null {
    let dims: { width?: number; height?: number; type?: string };
    try {
      dims = imageSize(bytes);
    } catch (err) {
      this.logger.warn(`Skipping ${label}: ${err instanceof Error ? err.message : String(err)}`);
      return null;
    }

    const { width, height, type } = dims;
    if (!width || !height || !isEmbeddable(type)) {
      this.logger.warn(`Skipping ${label}: unsupported image (${type ?? 'unknown type'})`);
      return null;
    }

    // type names the media part's extension, which [Content_Types].xml must cover
    return new ImageRun({
      type,
      data: bytes,
      transformation: {
        width: displayWidth,
        height: Math.round((displayWidth * height) / width),
      },
    });
  }
}
