import { IsString, IsOptional, IsBoolean } from 'class-validator';

export class TransliterateDto {
  @IsString()
  input!: string;

  // Overrides the stored setting for this call only
  @IsBoolean()
  @IsOptional()
  ignore_errors?: boolean;
}

export class TokenizeDto {
  @IsString()
  input!: string;
}
