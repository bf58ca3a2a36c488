import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  UpdateDateColumn,
} from 'typeorm';
import {
  EasyReadingSettings,
  TransliteratorDump,
  TransliteratorSettings,
} from '../../transliteration';

export enum SettingsFormat {
  DIRECT = 'direct',
  EASY_READING = 'easy_reading',
}

export type StoredSettings = TransliteratorSettings | EasyReadingSettings;

@Entity('transliterators')
export class Transliterator {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'varchar', length: 255 })
  name!: string;

  @Column({ type: 'text', nullable: true })
  description!: string | null;

  // Settings as submitted, in their own format
  @Column({ type: 'jsonb' })
  settings!: StoredSettings;

  @Column({
    type: 'enum',
    enum: SettingsFormat,
    default: SettingsFormat.DIRECT,
  })
  format!: SettingsFormat;

  // Dump of the built transliterator, loaded without rebuilding
  @Column({ type: 'jsonb' })
  compiled!: TransliteratorDump;

  @Column({ type: 'boolean', default: false })
  ignore_errors!: boolean;

  @Column({ type: 'boolean', default: true })
  check_ambiguity!: boolean;

  @Column({ type: 'varchar', length: 50 })
  version!: string;

  @CreateDateColumn()
  created_at!: Date;

  @UpdateDateColumn()
  updated_at!: Date;
}
