import { IsBase64, IsOptional, IsString, MaxLength, MinLength } from 'class-validator';

/** ~2 MB of image data once decoded */
const MAX_LOGO_BASE64 = 2_800_000;

export class BrandingDto {
  @IsOptional()
  @IsString()
  @MinLength(1)
  @MaxLength(120)
  brandName?: string;

  @IsOptional()
  @IsString()
  @MaxLength(120)
  partnerName?: string;

  @IsOptional()
  @IsBase64()
  @MaxLength(MAX_LOGO_BASE64)
  primaryLogo?: string;

  @IsOptional()
  @IsBase64()
  @MaxLength(MAX_LOGO_BASE64)
  partnerLogo?: string;
}
