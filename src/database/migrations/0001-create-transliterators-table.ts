import { MigrationInterface, QueryRunner } from 'typeorm';

export class CreateTransliteratorsTable1700000000001 implements MigrationInterface {
  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`
      DO $$ BEGIN
        CREATE TYPE transliterators_format_enum AS ENUM ('direct', 'easy_reading');
      EXCEPTION
        WHEN duplicate_object THEN NULL;
      END $$;
    `);

    await queryRunner.query(`
      CREATE TABLE IF NOT EXISTS transliterators (
        id              UUID PRIMARY KEY DEFAULT gen_random_uuid(),
        name            VARCHAR(255) NOT NULL,
        description     TEXT,
        settings        JSONB NOT NULL, -- as submitted, in the stored format
        format          transliterators_format_enum NOT NULL DEFAULT 'direct',
        compiled        JSONB NOT NULL, -- dump loaded without rebuilding
        ignore_errors   BOOLEAN NOT NULL DEFAULT FALSE,
        check_ambiguity BOOLEAN NOT NULL DEFAULT TRUE,
        version         VARCHAR(50) NOT NULL,
        created_at      TIMESTAMP NOT NULL DEFAULT NOW(),
        updated_at      TIMESTAMP NOT NULL DEFAULT NOW()
      );
    `);

    await queryRunner.query(`
      CREATE INDEX IF NOT EXISTS idx_transliterators_created ON transliterators(created_at DESC);
    `);
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`DROP TABLE IF EXISTS transliterators;`);
    await queryRunner.query(`DROP TYPE IF EXISTS transliterators_format_enum;`);
  }
}
