import { Type } from 'class-transformer';
import {
  Equals,
  IsBoolean,
  IsEmail,
  IsObject,
  IsOptional,
  IsString,
  MaxLength,
  MinLength,
  ValidateNested,
} from 'class-validator';
import { BrandingDto } from '../../report/dto/branding.dto';
import { Sanitized } from '../../common/sanitize/sanitized.decorator';
import type { QuestionId } from '../../common/types/scoring';

export class CreateSubmissionDto {
  @Sanitized()
  @IsString()
  @MinLength(1)
  @MaxLength(200)
  company!: string;

  @Sanitized()
  @IsString()
  @MinLength(1)
  @MaxLength(150)
  fullName!: string;

  @IsEmail()
  email!: string;

  @IsOptional()
  @IsString()
  @MaxLength(120)
  role?: string;

  @IsOptional()
  @IsString()
  @MaxLength(30)
  phone?: string;

  @IsObject()
  answers!: Record<QuestionId, unknown>;

  @IsOptional()
  @ValidateNested()
  @Type(() => BrandingDto)
  branding?: BrandingDto;

  @IsBoolean()
  @Equals(true)
  consentGiven!: boolean;
}
