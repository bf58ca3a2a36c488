import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { getRepositoryToken } from '@nestjs/typeorm';
import { Logger } from '@nestjs/common';
import { TransliteratorsService } from './transliterators.service';
import { SettingsFormat, Transliterator } from './entities/transliterator.entity';
import {
  AmbiguousRulesException,
  NoMatchingRuleException,
  TransliteratorNotFoundException,
  ValidationException,
} from '../common/exceptions';
import {
  GRAPH_TRANSLITERATOR_VERSION,
  GraphTransliterator,
  TransliteratorSettings,
} from '../transliteration';

describe('TransliteratorsService', () => {
  let service: TransliteratorsService;

  const mockRepository = {
    create: jest.fn(),
    save: jest.fn(),
    find: jest.fn(),
    findOne: jest.fn(),
    remove: jest.fn(),
  };

  const mockConfigService = {
    get: jest.fn(),
  };

  const boundarySettings = (): TransliteratorSettings => ({
    tokens: { a: ['class1'], b: ['class2'], ' ': ['wb'] },
    rules: [
      { production: 'A', tokens: ['a'] },
      { production: 'B', tokens: ['b'] },
      { production: ' ', tokens: [' '] },
    ],
    whitespace: { default: ' ', token_class: 'wb', consolidate: false },
    onmatch_rules: [{ prev_classes: ['class1'], next_classes: ['class2'], production: ',' }],
  });

  const recordOf = (id: string, settings: TransliteratorSettings, updatedAt = 1000): Transliterator => ({
    id,
    name: 'Test Transliterator',
    description: null,
    settings,
    format: SettingsFormat.DIRECT,
    compiled: GraphTransliterator.fromSettings(settings).dump(),
    ignore_errors: false,
    check_ambiguity: true,
    version: GRAPH_TRANSLITERATOR_VERSION,
    created_at: new Date(0),
    updated_at: new Date(updatedAt),
  });

  const createService = async (): Promise<TransliteratorsService> => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        TransliteratorsService,
        {
          provide: getRepositoryToken(Transliterator),
          useValue: mockRepository,
        },
        {
          provide: ConfigService,
          useValue: mockConfigService,
        },
      ],
    }).compile();

    return module.get<TransliteratorsService>(TransliteratorsService);
  };

  beforeAll(() => {
    jest.spyOn(Logger.prototype, 'log').mockImplementation(() => undefined);
    jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
  });

  beforeEach(async () => {
    mockRepository.create.mockImplementation((entity: Partial<Transliterator>) => ({ id: 't-new', ...entity }));
    mockRepository.save.mockImplementation(async (entity: Transliterator) => entity);
    mockConfigService.get.mockReturnValue(undefined);
    service = await createService();
  });

  afterEach(() => {
    jest.clearAllMocks();
  });

  afterAll(() => {
    jest.restoreAllMocks();
  });

  it('should be defined', () => {
    expect(service).toBeDefined();
  });

  describe('create', () => {
    it('should build and store the settings with their dump', async () => {
      const result = await service.create({ name: 'Boundary', settings: { ...boundarySettings() } });

      expect(result.id).toBe('t-new');
      expect(result.format).toBe(SettingsFormat.DIRECT);
      expect(result.description).toBeNull();
      expect(result.ignore_errors).toBe(false);
      expect(result.check_ambiguity).toBe(true);
      expect(result.version).toBe(GRAPH_TRANSLITERATOR_VERSION);
      expect(result.compiled.rules.map((rule) => rule.production)).toEqual(['A', 'B', ' ']);
      expect(mockRepository.save).toHaveBeenCalledTimes(1);
    });

    it('should accept compact notation', async () => {
      const result = await service.create({
        name: 'Compact',
        format: SettingsFormat.EASY_READING,
        settings: {
          tokens: { a: ['vowel'], b: ['consonant'], ' ': ['wb'] },
          rules: { a: 'A', b: 'B', ' ': ' ', '<consonant> a': 'Ä' },
          whitespace: { default: ' ', token_class: 'wb', consolidate: false },
        },
      });

      expect(result.format).toBe(SettingsFormat.EASY_READING);
      expect(result.settings.rules).toEqual({ a: 'A', b: 'B', ' ': ' ', '<consonant> a': 'Ä' });
      expect(result.compiled.rules.map((rule) => rule.production)).toEqual(['Ä', 'A', 'B', ' ']);
    });

    it('should refuse ambiguous rules unless the check is disabled', async () => {
      const settings = {
        tokens: { a: ['vowel'], b: ['vowel'], ' ': ['wb'] },
        rules: [
          { production: '1', tokens: ['a'], next_classes: ['vowel'] },
          { production: '2', tokens: ['a'], next_tokens: ['b'] },
          { production: 'B', tokens: ['b'] },
          { production: ' ', tokens: [' '] },
        ],
        whitespace: { default: ' ', token_class: 'wb', consolidate: false },
      };

      await expect(service.create({ name: 'Ambiguous', settings })).rejects.toThrow(AmbiguousRulesException);
      expect(mockRepository.save).not.toHaveBeenCalled();

      const result = await service.create({ name: 'Ambiguous', settings, check_ambiguity: false });
      expect(result.check_ambiguity).toBe(false);
    });

    it('should reject invalid settings', async () => {
      await expect(service.create({ name: 'Broken', settings: { tokens: {} } })).rejects.toThrow(
        ValidationException,
      );
      expect(mockRepository.save).not.toHaveBeenCalled();
    });
  });

  describe('findAll', () => {
    it('should list newest first', async () => {
      mockRepository.find.mockResolvedValue([]);

      await service.findAll();

      expect(mockRepository.find).toHaveBeenCalledWith({ order: { created_at: 'DESC' } });
    });
  });

  describe('findOne', () => {
    it('should return a transliterator', async () => {
      const record = recordOf('t-1', boundarySettings());
      mockRepository.findOne.mockResolvedValue(record);

      await expect(service.findOne('t-1')).resolves.toBe(record);
      expect(mockRepository.findOne).toHaveBeenCalledWith({ where: { id: 't-1' } });
    });

    it('should throw TransliteratorNotFoundException if missing', async () => {
      mockRepository.findOne.mockResolvedValue(null);

      await expect(service.findOne('t-1')).rejects.toThrow(TransliteratorNotFoundException);
    });
  });

  describe('transliterate', () => {
    it('should return the output with the tokens and rules used', async () => {
      mockRepository.findOne.mockResolvedValue(recordOf('t-1', boundarySettings()));

      const result = await service.transliterate('t-1', { input: 'ab' });

      expect(result).toEqual({
        output: 'A,B',
        tokens: [' ', 'a', 'b', ' '],
        matched_rules: [
          { key: 0, production: 'A', tokens: ['a'] },
          { key: 1, production: 'B', tokens: ['b'] },
        ],
      });
    });

    it('should override error handling for one call only', async () => {
      const settings = boundarySettings();
      settings.rules = settings.rules.filter((rule) => rule.production !== 'B');
      mockRepository.findOne.mockResolvedValue(recordOf('t-1', settings));

      await expect(service.transliterate('t-1', { input: 'ab', ignore_errors: true })).resolves.toMatchObject({
        output: 'A',
      });
      await expect(service.transliterate('t-1', { input: 'ab' })).rejects.toThrow(NoMatchingRuleException);
    });
  });

  describe('tokenize', () => {
    it('should return the tokens', async () => {
      mockRepository.findOne.mockResolvedValue(recordOf('t-1', boundarySettings()));

      await expect(service.tokenize('t-1', { input: 'ba' })).resolves.toEqual({ tokens: [' ', 'b', 'a', ' '] });
    });
  });

  describe('productions', () => {
    it('should list productions in rule key order', async () => {
      mockRepository.findOne.mockResolvedValue(recordOf('t-1', boundarySettings()));

      await expect(service.productions('t-1')).resolves.toEqual({ productions: ['A', 'B', ' '] });
    });
  });

  describe('prune', () => {
    it('should store a copy without the pruned productions', async () => {
      mockRepository.findOne.mockResolvedValue(recordOf('t-1', boundarySettings()));

      const result = await service.prune('t-1', { productions: ['B'] });

      expect(result.id).toBe('t-new');
      expect(result.name).toBe('Test Transliterator (pruned)');
      expect(result.format).toBe(SettingsFormat.DIRECT);
      expect(result.compiled.rules.map((rule) => rule.production)).toEqual(['A', ' ']);
    });

    it('should use the given name', async () => {
      mockRepository.findOne.mockResolvedValue(recordOf('t-1', boundarySettings()));

      const result = await service.prune('t-1', { productions: ['A'], name: 'Only B' });

      expect(result.name).toBe('Only B');
    });

    it('should keep checking ambiguity when pruning a stored transliterator', async () => {
      const settings: TransliteratorSettings = {
        tokens: { a: ['vowel'], b: ['vowel'], ' ': ['wb'] },
        rules: [
          { production: '1', tokens: ['a'], next_classes: ['vowel'] },
          { production: '2', tokens: ['a'], next_tokens: ['b'] },
          { production: '3', tokens: ['a', 'b'] },
          { production: 'A', tokens: ['a'] },
          { production: 'B', tokens: ['b'] },
          { production: ' ', tokens: [' '] },
        ],
        whitespace: { default: ' ', token_class: 'wb', consolidate: false },
      };
      mockRepository.findOne.mockResolvedValue(recordOf('t-1', settings));

      await expect(service.prune('t-1', { productions: ['3'] })).rejects.toThrow(AmbiguousRulesException);
      expect(mockRepository.save).not.toHaveBeenCalled();

      const result = await service.prune('t-1', { productions: ['B'] });
      expect(result.check_ambiguity).toBe(true);
      expect(result.compiled.check_ambiguity).toBe(true);
    });
  });

  describe('update', () => {
    it('should rebuild from the new settings', async () => {
      mockRepository.findOne.mockResolvedValue(recordOf('t-1', boundarySettings()));
      const settings = boundarySettings();
      settings.rules = [...settings.rules, { production: 'AB', tokens: ['a', 'b'] }];

      const result = await service.update('t-1', { name: 'Renamed', settings: { ...settings } });

      expect(result.name).toBe('Renamed');
      expect(result.compiled.rules.map((rule) => rule.production)).toEqual(['AB', 'A', 'B', ' ']);
    });

    it('should keep stored settings when only flags change', async () => {
      mockRepository.findOne.mockResolvedValue(recordOf('t-1', boundarySettings()));

      const result = await service.update('t-1', { ignore_errors: true });

      expect(result.ignore_errors).toBe(true);
      expect(result.compiled.ignore_errors).toBe(true);
      expect(result.compiled.rules).toHaveLength(3);
    });
  });

  describe('remove', () => {
    it('should remove the record', async () => {
      const record = recordOf('t-1', boundarySettings());
      mockRepository.findOne.mockResolvedValue(record);

      await service.remove('t-1');

      expect(mockRepository.remove).toHaveBeenCalledWith(record);
    });
  });

  describe('instance cache', () => {
    it('should load a stored transliterator once until it changes', async () => {
      const load = jest.spyOn(GraphTransliterator, 'load');
      mockRepository.findOne.mockResolvedValue(recordOf('t-1', boundarySettings()));

      await service.transliterate('t-1', { input: 'a' });
      await service.transliterate('t-1', { input: 'b' });
      expect(load).toHaveBeenCalledTimes(1);

      mockRepository.findOne.mockResolvedValue(recordOf('t-1', boundarySettings(), 2000));
      await service.transliterate('t-1', { input: 'a' });
      expect(load).toHaveBeenCalledTimes(2);
    });

    it('should evict the least recently used instance', async () => {
      mockConfigService.get.mockReturnValue('1');
      const small = await createService();
      const load = jest.spyOn(GraphTransliterator, 'load');
      const records = new Map([
        ['t-1', recordOf('t-1', boundarySettings())],
        ['t-2', recordOf('t-2', boundarySettings())],
      ]);
      mockRepository.findOne.mockImplementation(async ({ where }: { where: { id: string } }) =>
        records.get(where.id),
      );

      await small.tokenize('t-1', { input: 'a' });
      await small.tokenize('t-2', { input: 'a' });
      await small.tokenize('t-1', { input: 'a' });

      expect(load).toHaveBeenCalledTimes(3);
    });
  });
});
