import {
  ArrayNotEmpty,
  IsArray,
  IsBoolean,
  IsNotEmpty,
  IsObject,
  IsOptional,
  IsString,
  ValidateNested,
} from 'class-validator';
import { Type } from 'class-transformer';
import {
  Metadata,
  OnMatchRuleSettings,
  TransliterationRuleSettings,
  TransliteratorSettings,
  WhitespaceSettings,
} from '../interfaces/transliteration.interfaces';
import { IsTokenClassRecord } from './record.validators';

export class TransliterationRuleDto implements TransliterationRuleSettings {
  @IsString()
  production!: string;

  @IsArray()
  @ArrayNotEmpty()
  @IsString({ each: true })
  tokens!: string[];

  @IsOptional()
  @IsArray()
  @IsString({ each: true })
  prev_tokens?: string[] | null;

  @IsOptional()
  @IsArray()
  @IsString({ each: true })
  prev_classes?: string[] | null;

  @IsOptional()
  @IsArray()
  @IsString({ each: true })
  next_tokens?: string[] | null;

  @IsOptional()
  @IsArray()
  @IsString({ each: true })
  next_classes?: string[] | null;
}

export class OnMatchRuleDto implements OnMatchRuleSettings {
  @IsArray()
  @ArrayNotEmpty()
  @IsString({ each: true })
  prev_classes!: string[];

  @IsArray()
  @ArrayNotEmpty()
  @IsString({ each: true })
  next_classes!: string[];

  @IsString()
  production!: string;
}

export class WhitespaceDto implements WhitespaceSettings {
  @IsString()
  @IsNotEmpty()
  default!: string;

  @IsString()
  @IsNotEmpty()
  token_class!: string;

  @IsBoolean()
  consolidate!: boolean;
}

export class TransliteratorSettingsDto implements TransliteratorSettings {
  @IsTokenClassRecord()
  tokens!: Record<string, string[]>;

  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => TransliterationRuleDto)
  rules!: TransliterationRuleDto[];

  @IsObject()
  @ValidateNested()
  @Type(() => WhitespaceDto)
  whitespace!: WhitespaceDto;

  @IsOptional()
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => OnMatchRuleDto)
  onmatch_rules?: OnMatchRuleDto[];

  @IsOptional()
  @IsObject()
  metadata?: Metadata;
}
