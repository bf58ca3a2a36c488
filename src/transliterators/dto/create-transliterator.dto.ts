import {
  IsString,
  IsNotEmpty,
  IsEnum,
  IsObject,
  IsOptional,
  IsBoolean,
} from 'class-validator';
import { SettingsFormat } from '../entities/transliterator.entity';

export class CreateTransliteratorDto {
  @IsString()
  @IsNotEmpty()
  name!: string;

  @IsString()
  @IsOptional()
  description?: string;

  // Checked in depth when the transliterator is built
  @IsObject()
  settings!: Record<string, unknown>;

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
