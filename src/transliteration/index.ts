export { GraphTransliterator } from './graph-transliterator';
export { easyReadingToSettings, parseEasyReadingSettings } from './easy-reading';
export { validateEasyReadingSettings, validateSettings } from './settings-validator';
export { GRAPH_TRANSLITERATOR_VERSION } from './version';
export type { DeserializeOptions } from './serialization';
export type {
  BuildOptions,
  EasyReadingSettings,
  Metadata,
  OnMatchRule,
  Token,
  TokenClass,
  TransliterationDetails,
  TransliterationRule,
  TransliteratorDump,
  TransliteratorSettings,
  WhitespacePolicy,
} from './interfaces/transliteration.interfaces';
