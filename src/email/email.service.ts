import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Resend } from 'resend';
import type { ReportDocument } from '../common/types/report';

@Injectable()
export class EmailService {
  private readonly resend: Resend | null;
  private readonly logger = new Logger(EmailService.name);

  constructor(private readonly config: ConfigService) {
    const apiKey = this.config.get<string>('RESEND_API_KEY');
    this.resend = apiKey ? new Resend(apiKey) : null;
    if (!this.resend) {
      this.logger.warn('RESEND_API_KEY not set; review emails are disabled');
    }
  }

  /** HTML-escape a string to prevent injection in email templates */
  private escapeHtml(str: string): string {
    return str
      .replace(/&/g, '&amp;')
      .replace(/</g, '&lt;')
      .replace(/>/g, '&gt;')
      .replace(/"/g, '&quot;')
      .replace(/'/g, '&#39;');
  }

  /** Mask an email address for safe logging (e.g. j***@example.com) */
  private maskEmail(email: string): string {
    const [local, domain] = email.split('@');
    if (!local || !domain) return '***';
    return `${local[0]}***@${domain}`;
  }

  async sendReportForReview(params: {
    toEmail: string;
    company: string;
    submissionId: string;
    document: ReportDocument;
  }): Promise<boolean> {
    if (!this.resend) return false;

    const safeName = this.escapeHtml(params.company);
    // Strip newlines/control chars from subject to prevent header injection
    const safeSubject = params.company.replace(/[\r\n\t]/g, ' ').trim();

    try {
      const { error } = await this.resend.emails.send({
        from: this.config.get<string>('EMAIL_FROM', 'noreply@example.com'),
        to: params.toEmail,
        subject: `Channel Readiness submission pending review — ${safeSubject}`,
        html: `
          <p>A new Channel Readiness submission from <strong>${safeName}</strong> is waiting for review.</p>
          <p>Submission ID: <code>${this.escapeHtml(params.submissionId)}</code></p>
          <p>The summary report is attached. Approve the submission before forwarding it to the client.</p>
        `,
        attachments: [
          {
            filename: params.document.filename,
            content: params.document.bytes,
          },
        ],
      });
      if (error) {
        this.logger.error(`Resend rejected review email: ${error.message}`);
        return false;
      }
      this.logger.log(`Review email sent to ${this.maskEmail(params.toEmail)}`);
      return true;
    } catch (err) {
      this.logger.error('Failed to send review email', err);
      return false;
    }
  }
}
