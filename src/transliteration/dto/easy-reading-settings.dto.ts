import { IsArray, IsObject, IsOptional, ValidateNested } from 'class-validator';
import { Type } from 'class-transformer';
import { EasyReadingSettings, Metadata } from '../interfaces/transliteration.interfaces';
import { WhitespaceDto } from './transliterator-settings.dto';
import { IsStringRecord, IsTokenClassRecord } from './record.validators';

export class EasyReadingSettingsDto implements EasyReadingSettings {
  @IsTokenClassRecord()
  tokens!: Record<string, string[]>;

  @IsStringRecord()
  rules!: Record<string, string>;

  @IsObject()
  @ValidateNested()
  @Type(() => WhitespaceDto)
  whitespace!: WhitespaceDto;

  @IsOptional()
  @IsArray()
  @IsStringRecord({ each: true })
  onmatch_rules?: Array<Record<string, string>>;

  @IsOptional()
  @IsObject()
  metadata?: Metadata;
}
