import {
  IsString,
  IsNotEmpty,
  IsEnum,
  IsObject,
  IsOptional,
  IsBoolean,
} from 'class-validator';
import { SettingsFormat } from '../entities/transliterator.entity';

export class UpdateTransliteratorDto {
  @IsString()
  @IsNotEmpty()
  @IsOptional()
  name?: string;

  @IsString()
  @IsOptional()
  description?: string;

  @IsObject()
  @IsOptional()
  settings?: Record<string, unknown>;

  @IsEnum(SettingsFormat)
  @IsOptional()
  format?: SettingsFormat;

  @IsBoolean()
  @IsOptional()
  ignore_errors?: boolean;

  @IsBoolean()
  @IsOptional()
  check_ambiguity?: boolean;
}
