export {
  createEmptyContext,
  mergeContext,
  getMissingFields,
  isContextComplete,
  isFieldMissing,
  contextToPromptText,
  enumLabel,
  FIELD_LABELS,
} from './model';
export { FieldExtractor, extractFieldsFromMessage, extractEnumFields } from './extractor';
export * from './types';
export type { AssistedExtraction } from './extractor';
