import { BadRequestException, Injectable, Logger, NotFoundException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectModel } from '@nestjs/mongoose';
import { Model } from 'mongoose';
import { Submission, SubmissionDocument, SubmissionStatus } from './submission.schema';
import { CreateSubmissionDto } from './dto/create-submission.dto';
import { ScoringService } from '../common/scoring/scoring.service';
import { EncryptionService } from '../common/encryption/encryption.service';
import { IdService } from '../common/id/id.service';
import { SanitizeService } from '../common/sanitize/sanitize.service';
import { roundScore } from '../common/scoring/thresholds';
import { QUESTIONNAIRE_VERSION } from '../common/config/questions';
import { ReportService } from '../report/report.service';
import { EmailService } from '../email/email.service';
import type { AnswerSet, ScoreResult, TierLabel } from '../common/types/scoring';
import type { BrandingContext } from '../common/types/report';

/** Flat lead record: what gets stored and reviewed. The DOCX itself is never stored. */
export interface SubmissionRecord {
  submittedAt: Date;
  brandName: string;
  coBrandPartner: string;
  company: string;
  fullName: string;
  email: string;
  role: string;
  phone: string;
  overallScore: number;
  tier: TierLabel;
  pillarScores: Record<string, number>;
  answers: Record<string, number>;
  questionnaireVersion: string;
  status: SubmissionStatus;
  approvalRequired: boolean;
  consentGiven: boolean;
}

export interface SubmissionReceipt {
  submissionId: string;
  status: SubmissionStatus;
  approvalRequired: boolean;
}

@Injectable()
export class SubmissionService {
  private readonly logger = new Logger(SubmissionService.name);

  constructor(
    @InjectModel(Submission.name) private submissionModel: Model<SubmissionDocument>,
    private config: ConfigService,
    private scoring: ScoringService,
    private encryption: EncryptionService,
    private id: IdService,
    private sanitize: SanitizeService,
    private reportService: ReportService,
    private emailService: EmailService,
  ) {}

  async submit(dto: CreateSubmissionDto, asAdmin = false): Promise<SubmissionReceipt> {
    const company = this.sanitize.sanitize(dto.company);
    const fullName = this.sanitize.sanitize(dto.fullName);
    if (!company || !fullName) {
      throw new BadRequestException('company and fullName must contain text');
    }
    const branding = this.reportService.toBranding(dto.branding);
    const scores = this.scoring.computeScores(dto.answers);

    const record = this.buildRecord({
      company,
      branding,
      scores,
      fullName,
      email: this.sanitize.sanitize(dto.email).toLowerCase(),
      role: this.sanitize.optional(dto.role) ?? '',
      phone: this.sanitize.optional(dto.phone) ?? '',
      status: asAdmin ? 'Submitted by Admin' : 'Pending Review',
      consentGiven: dto.consentGiven,
    });

    const submissionId = this.id.generateId();
    await this.submissionModel.create({
      _id: submissionId,
      ...record,
      fullName: this.encryption.encrypt(record.fullName),
      email: this.encryption.encrypt(record.email),
      emailHash: this.encryption.hashForDedup(record.email),
      phone: record.phone ? this.encryption.encrypt(record.phone) : '',
    });
    this.logger.log(`Submission ${submissionId} stored (${record.tier}, ${record.status})`);

    // Report delivery must never affect the stored record
    const reviewer = this.config.get<string>('REVIEW_EMAIL');
    if (reviewer) {
      this.deliverForReview(submissionId, reviewer, company, dto.answers, branding).catch((err) => {
        this.logger.error(`Background report delivery failed for submission ${submissionId}`, err);
      });
    }

    return { submissionId, status: record.status, approvalRequired: record.approvalRequired };
  }

  buildRecord(params: {
    company: string;
    branding: BrandingContext;
    scores: ScoreResult;
    fullName: string;
    email: string;
    role: string;
    phone: string;
    status: SubmissionStatus;
    consentGiven: boolean;
    submittedAt?: Date;
  }): SubmissionRecord {
    const { scores } = params;

    const pillarScores: Record<string, number> = {};
    const answers: Record<string, number> = {};
    for (const p of scores.pillarScores) {
      pillarScores[p.pillar] = roundScore(p.score);
      Object.assign(answers, p.answers);
    }

    return {
      submittedAt: params.submittedAt ?? new Date(),
      brandName: params.branding.brandName,
      coBrandPartner: params.branding.partnerName ?? '',
      company: params.company,
      fullName: params.fullName,
      email: params.email,
      role: params.role,
      phone: params.phone,
      overallScore: roundScore(scores.overall),
      tier: scores.tier,
      pillarScores,
      answers,
      questionnaireVersion: QUESTIONNAIRE_VERSION,
      status: params.status,
      approvalRequired: this.approvalRequired(),
      consentGiven: params.consentGiven,
    };
  }

  /** Decrypted record for reviewers. */
  async findOne(submissionId: string): Promise<SubmissionRecord & { submissionId: string }> {
    const doc = await this.submissionModel.findById(submissionId);
    if (!doc) {
      throw new NotFoundException('Submission not found');
    }

    return {
      submissionId: doc._id,
      submittedAt: doc.submittedAt,
      brandName: doc.brandName,
      coBrandPartner: doc.coBrandPartner,
      company: doc.company,
      fullName: this.encryption.decrypt(doc.fullName),
      email: this.encryption.decrypt(doc.email),
      role: doc.role,
      phone: doc.phone ? this.encryption.decrypt(doc.phone) : '',
      overallScore: doc.overallScore,
      tier: doc.tier,
      pillarScores: doc.pillarScores,
      answers: doc.answers,
      questionnaireVersion: doc.questionnaireVersion,
      status: doc.status,
      approvalRequired: doc.approvalRequired,
      consentGiven: doc.consentGiven,
    };
  }

  async approve(submissionId: string): Promise<{ submissionId: string; status: SubmissionStatus }> {
    const doc = await this.submissionModel.findByIdAndUpdate(
      submissionId,
      { status: 'Approved' },
      { new: true },
    );
    if (!doc) {
      throw new NotFoundException('Submission not found');
    }
    this.logger.log(`Submission ${submissionId} approved`);
    return { submissionId, status: doc.status };
  }

  private approvalRequired(): boolean {
    const raw = this.config.get<string>('APPROVAL_REQUIRED', 'true').trim().toLowerCase();
    return ['1', 'true', 'yes'].includes(raw);
  }

  /** Compose the report and send it to the reviewer. */
  private async deliverForReview(
    submissionId: string,
    reviewer: string,
    company: string,
    answers: AnswerSet,
    branding: BrandingContext,
  ): Promise<void> {
    const { document } = await this.reportService.generate({ company, answers, branding });

    const sent = await this.emailService.sendReportForReview({
      toEmail: reviewer,
      company,
      submissionId,
      document,
    });
    if (!sent) {
      this.logger.warn(`Review email failed for submission ${submissionId}`);
    }
  }
}
