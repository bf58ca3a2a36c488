import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { TransliteratorsService } from './transliterators.service';
import { TransliteratorsController } from './transliterators.controller';
import { Transliterator } from './entities/transliterator.entity';

@Module({
  imports: [TypeOrmModule.forFeature([Transliterator])],
  controllers: [TransliteratorsController],
  providers: [TransliteratorsService],
  exports: [TransliteratorsService],
})
export class TransliteratorsModule {}
