import {
  Controller,
  Get,
  Post,
  Put,
  Delete,
  Body,
  Param,
  ParseUUIDPipe,
  HttpCode,
  HttpStatus,
} from '@nestjs/common';
import { TransliteratorsService } from './transliterators.service';
import { CreateTransliteratorDto } from './dto/create-transliterator.dto';
import { UpdateTransliteratorDto } from './dto/update-transliterator.dto';
import { TokenizeDto, TransliterateDto } from './dto/transliterate.dto';
import { PruneTransliteratorDto } from './dto/prune-transliterator.dto';

@Controller('transliterators')
export class TransliteratorsController {
  constructor(private readonly transliteratorsService: TransliteratorsService) {}

  @Post()
  @HttpCode(HttpStatus.CREATED)
  async create(@Body() createTransliteratorDto: CreateTransliteratorDto) {
    return this.transliteratorsService.create(createTransliteratorDto);
  }

  @Get()
  async findAll() {
    return this.transliteratorsService.findAll();
  }

  @Get(':id')
  async findOne(@Param('id', ParseUUIDPipe) id: string) {
    return this.transliteratorsService.findOne(id);
  }

  @Put(':id')
  async update(
    @Param('id', ParseUUIDPipe) id: string,
    @Body() updateTransliteratorDto: UpdateTransliteratorDto,
  ) {
    return this.transliteratorsService.update(id, updateTransliteratorDto);
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  async remove(@Param('id', ParseUUIDPipe) id: string) {
    await this.transliteratorsService.remove(id);
  }

  @Post(':id/transliterate')
  @HttpCode(HttpStatus.OK)
  async transliterate(
    @Param('id', ParseUUIDPipe) id: string,
    @Body() transliterateDto: TransliterateDto,
  ) {
    return this.transliteratorsService.transliterate(id, transliterateDto);
  }

  @Post(':id/tokenize')
  @HttpCode(HttpStatus.OK)
  async tokenize(@Param('id', ParseUUIDPipe) id: string, @Body() tokenizeDto: TokenizeDto) {
    return this.transliteratorsService.tokenize(id, tokenizeDto);
  }

  @Post(':id/prune')
  @HttpCode(HttpStatus.CREATED)
  async prune(
    @Param('id', ParseUUIDPipe) id: string,
    @Body() pruneDto: PruneTransliteratorDto,
  ) {
    return this.transliteratorsService.prune(id, pruneDto);
  }

  @Get(':id/productions')
  async productions(@Param('id', ParseUUIDPipe) id: string) {
    return this.transliteratorsService.productions(id);
  }
}
