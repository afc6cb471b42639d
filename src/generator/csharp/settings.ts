import type { CSharpGeneratorSettings } from '../../types/index.js';

export const DEFAULT_CSHARP_SETTINGS: Readonly<CSharpGeneratorSettings> = {
  namespace: 'GeneratedTypes',
  arrayType: 'System.Collections.Generic.ICollection',
  dictionaryType: 'System.Collections.Generic.IDictionary',
  dateType: 'System.DateTimeOffset',
  dateTimeType: 'System.DateTimeOffset',
  timeType: 'System.TimeSpan',
  timeSpanType: 'System.TimeSpan',
  nullableDictionaryValues: false,
  generateAllDefinitions: true,
  generateDocumentation: true,
};

/**
 * Fills unset settings with defaults. Keys explicitly set to undefined keep the default.
 */
export function createCSharpGeneratorSettings(
  overrides: Partial<CSharpGeneratorSettings> = {}
): CSharpGeneratorSettings {
  const settings = DEFAULT_CSHARP_SETTINGS;
  return {
    namespace: overrides.namespace ?? settings.namespace,
    arrayType: overrides.arrayType ?? settings.arrayType,
    dictionaryType: overrides.dictionaryType ?? settings.dictionaryType,
    dateType: overrides.dateType ?? settings.dateType,
    dateTimeType: overrides.dateTimeType ?? settings.dateTimeType,
    timeType: overrides.timeType ?? settings.timeType,
    timeSpanType: overrides.timeSpanType ?? settings.timeSpanType,
    nullableDictionaryValues: overrides.nullableDictionaryValues ?? settings.nullableDictionaryValues,
    generateAllDefinitions: overrides.generateAllDefinitions ?? settings.generateAllDefinitions,
    rootTypeName: overrides.rootTypeName ?? settings.rootTypeName,
    generateDocumentation: overrides.generateDocumentation ?? settings.generateDocumentation,
  };
}
