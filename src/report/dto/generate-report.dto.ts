import { Type } from 'class-transformer';
import { IsOptional, IsString, MaxLength, MinLength, ValidateNested } from 'class-validator';
import { ScoreAssessmentDto } from '../../assessment/dto/score-assessment.dto';
import { Sanitized } from '../../common/sanitize/sanitized.decorator';
import { BrandingDto } from './branding.dto';

export class GenerateReportDto extends ScoreAssessmentDto {
  @Sanitized()
  @IsString()
  @MinLength(1)
  @MaxLength(200)
  company!: string;

  @IsOptional()
  @ValidateNested()
  @Type(() => BrandingDto)
  branding?: BrandingDto;
}
