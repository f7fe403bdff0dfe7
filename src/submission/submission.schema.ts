import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument } from 'mongoose';
import type { TierLabel } from '../common/types/scoring';
import { TIER_BANDS } from '../common/config/tiers';

export type SubmissionDocument = HydratedDocument<Submission>;

export const SUBMISSION_STATUSES = ['Pending Review', 'Submitted by Admin', 'Approved'] as const;
export type SubmissionStatus = (typeof SUBMISSION_STATUSES)[number];

@Schema({ timestamps: true })
export class Submission {
  @Prop({ type: String, required: true })
  _id!: string;

  @Prop({ required: true })
  submittedAt!: Date;

  @Prop({ required: true })
  brandName!: string;

  @Prop({ type: String, default: '' })
  coBrandPartner!: string;

  @Prop({ required: true })
  company!: string;

  @Prop({ required: true })
  fullName!: string; // encrypted

  @Prop({ required: true })
  email!: string; // encrypted

  @Prop({ required: true, index: true })
  emailHash!: string; // SHA-256 for lookups

  @Prop({ type: String, default: '' })
  role!: string;

  @Prop({ type: String, default: '' })
  phone!: string; // encrypted when present

  @Prop({ required: true, min: 0, max: 100 })
  overallScore!: number;

  @Prop({ type: String, required: true, enum: TIER_BANDS.map((b) => b.label) })
  tier!: TierLabel;

  @Prop({ type: Object, required: true })
  pillarScores!: Record<string, number>;

  @Prop({ type: Object, required: true })
  answers!: Record<string, number>;

  @Prop({ required: true })
  questionnaireVersion!: string;

  @Prop({ type: String, required: true, enum: SUBMISSION_STATUSES })
  status!: SubmissionStatus;

  @Prop({ required: true })
  approvalRequired!: boolean;

  @Prop({ required: true })
  consentGiven!: boolean;
}

export const SubmissionSchema = SchemaFactory.createForClass(Submission);
