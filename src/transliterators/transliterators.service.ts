import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { TransliteratorNotFoundException } from '../common/exceptions';
import {
  BuildOptions,
  GraphTransliterator,
  easyReadingToSettings,
  validateEasyReadingSettings,
  validateSettings,
} from '../transliteration';
import { CreateTransliteratorDto } from './dto/create-transliterator.dto';
import { UpdateTransliteratorDto } from './dto/update-transliterator.dto';
import { TokenizeDto, TransliterateDto } from './dto/transliterate.dto';
import { PruneTransliteratorDto } from './dto/prune-transliterator.dto';
import {
  SettingsFormat,
  StoredSettings,
  Transliterator,
} from './entities/transliterator.entity';

export const DEFAULT_CACHE_SIZE = 100;

export interface MatchedRule {
  key: number;
  production: string;
  tokens: string[];
}

export interface TransliterationResult {
  output: string;
  tokens: string[];
  matched_rules: MatchedRule[];
}

interface CompiledSettings {
  settings: StoredSettings;
  transliterator: GraphTransliterator;
}

interface CacheEntry {
  updatedAt: number;
  transliterator: GraphTransliterator;
}

@Injectable()
export class TransliteratorsService {
  private readonly logger = new Logger(TransliteratorsService.name);
  private readonly cache = new Map<string, CacheEntry>();
  private readonly cacheSize: number;

  constructor(
    @InjectRepository(Transliterator)
    private transliteratorRepository: Repository<Transliterator>,
    private configService: ConfigService,
  ) {
    const configured = Number(this.configService.get<string>('TRANSLITERATOR_CACHE_SIZE'));
    this.cacheSize = Number.isInteger(configured) && configured > 0 ? configured : DEFAULT_CACHE_SIZE;
  }

  async create(createTransliteratorDto: CreateTransliteratorDto): Promise<Transliterator> {
    const format = createTransliteratorDto.format ?? SettingsFormat.DIRECT;
    const { settings, transliterator } = this.compile(createTransliteratorDto.settings, format, {
      ignoreErrors: createTransliteratorDto.ignore_errors ?? false,
      checkAmbiguity: createTransliteratorDto.check_ambiguity ?? true,
    });

    const record = this.transliteratorRepository.create({
      name: createTransliteratorDto.name,
      description: createTransliteratorDto.description ?? null,
      settings,
      format,
      ...this.compiledFieldsOf(transliterator),
    });
    const saved = await this.transliteratorRepository.save(record);
    this.logger.log(`Created transliterator ${saved.id} with ${transliterator.rules.length} rules`);
    return saved;
  }

  async findAll(): Promise<Transliterator[]> {
    return this.transliteratorRepository.find({
      order: { created_at: 'DESC' },
    });
  }

  async findOne(id: string): Promise<Transliterator> {
    const transliterator = await this.transliteratorRepository.findOne({
      where: { id },
    });

    if (!transliterator) {
      throw new TransliteratorNotFoundException(id);
    }

    return transliterator;
  }

  /**
   * Apply changes and rebuild from the resulting settings, so a stored
   * record always holds a dump of its own settings.
   */
  async update(id: string, updateTransliteratorDto: UpdateTransliteratorDto): Promise<Transliterator> {
    const record = await this.findOne(id);
    const format = updateTransliteratorDto.format ?? record.format;
    const { settings, transliterator } = this.compile(
      updateTransliteratorDto.settings ?? record.settings,
      format,
      {
        ignoreErrors: updateTransliteratorDto.ignore_errors ?? record.ignore_errors,
        checkAmbiguity: updateTransliteratorDto.check_ambiguity ?? record.check_ambiguity,
      },
    );

    Object.assign(record, {
      ...(updateTransliteratorDto.name !== undefined && { name: updateTransliteratorDto.name }),
      ...(updateTransliteratorDto.description !== undefined && {
        description: updateTransliteratorDto.description,
      }),
      settings,
      format,
      ...this.compiledFieldsOf(transliterator),
    });
    const saved = await this.transliteratorRepository.save(record);
    this.cache.delete(id);
    this.logger.log(`Rebuilt transliterator ${id}`);
    return saved;
  }

  async remove(id: string): Promise<void> {
    const record = await this.findOne(id);
    await this.transliteratorRepository.remove(record);
    this.cache.delete(id);
  }

  async transliterate(id: string, transliterateDto: TransliterateDto): Promise<TransliterationResult> {
    const transliterator = await this.instanceOf(id);
    const details = this.withErrorHandling(transliterator, transliterateDto.ignore_errors, () =>
      transliterator.transliterateWithDetails(transliterateDto.input),
    );

    return {
      output: details.output,
      tokens: details.tokens,
      matched_rules: details.ruleKeys.map((key) => ({
        key,
        production: transliterator.rules[key].production,
        tokens: [...transliterator.rules[key].tokens],
      })),
    };
  }

  async tokenize(id: string, tokenizeDto: TokenizeDto): Promise<{ tokens: string[] }> {
    const transliterator = await this.instanceOf(id);
    return { tokens: transliterator.tokenize(tokenizeDto.input) };
  }

  async productions(id: string): Promise<{ productions: string[] }> {
    const transliterator = await this.instanceOf(id);
    return { productions: transliterator.productions };
  }

  /**
   * Store a copy without the rules producing the given productions. The copy
   * keeps its settings in direct form.
   */
  async prune(id: string, pruneDto: PruneTransliteratorDto): Promise<Transliterator> {
    const source = await this.findOne(id);
    const pruned = (await this.instanceOf(id)).prunedOf(pruneDto.productions);

    const record = this.transliteratorRepository.create({
      name: pruneDto.name ?? `${source.name} (pruned)`,
      description: source.description,
      settings: pruned.toSettings(),
      format: SettingsFormat.DIRECT,
      ...this.compiledFieldsOf(pruned),
    });
    const saved = await this.transliteratorRepository.save(record);
    this.logger.log(
      `Pruned transliterator ${id} into ${saved.id} (${source.compiled.rules.length} -> ${pruned.rules.length} rules)`,
    );
    return saved;
  }

  /**
   * Loaded instance for a stored record, reused until the record changes.
   * Least recently used entries are evicted first.
   */
  private async instanceOf(id: string): Promise<GraphTransliterator> {
    const record = await this.findOne(id);
    const updatedAt = record.updated_at.getTime();
    const cached = this.cache.get(id);

    if (cached && cached.updatedAt === updatedAt) {
      this.cache.delete(id);
      this.cache.set(id, cached);
      return cached.transliterator;
    }

    const transliterator = GraphTransliterator.load(record.compiled, {
      ignoreErrors: record.ignore_errors,
      checkAmbiguity: record.check_ambiguity,
    });
    this.cache.delete(id);
    this.cache.set(id, { updatedAt, transliterator });

    for (const key of this.cache.keys()) {
      if (this.cache.size <= this.cacheSize) {
        break;
      }
      this.cache.delete(key);
    }

    return transliterator;
  }

  private compile(raw: unknown, format: SettingsFormat, options: BuildOptions): CompiledSettings {
    if (format === SettingsFormat.EASY_READING) {
      const settings = validateEasyReadingSettings(raw);
      return {
        settings,
        transliterator: GraphTransliterator.build(
          validateSettings(easyReadingToSettings(settings)),
          options,
        ),
      };
    }

    const settings = validateSettings(raw);
    return { settings, transliterator: GraphTransliterator.build(settings, options) };
  }

  private compiledFieldsOf(transliterator: GraphTransliterator) {
    return {
      compiled: transliterator.dump(),
      ignore_errors: transliterator.ignoreErrors,
      check_ambiguity: transliterator.checkAmbiguity,
      version: transliterator.version,
    };
  }

  // Calls are synchronous, so a temporary override cannot leak into another request
  private withErrorHandling<T>(
    transliterator: GraphTransliterator,
    ignoreErrors: boolean | undefined,
    call: () => T,
  ): T {
    if (ignoreErrors === undefined || ignoreErrors === transliterator.ignoreErrors) {
      return call();
    }

    const stored = transliterator.ignoreErrors;
    transliterator.ignoreErrors = ignoreErrors;
    try {
      return call();
    } finally {
      transliterator.ignoreErrors = stored;
    }
  }
}
