import { IsString, IsNotEmpty, IsOptional, IsArray, ArrayNotEmpty } from 'class-validator';

export class PruneTransliteratorDto {
  @IsArray()
  @ArrayNotEmpty()
  @IsString({ each: true })
  productions!: string[];

  @IsString()
  @IsNotEmpty()
  @IsOptional()
  name?: string;
}
