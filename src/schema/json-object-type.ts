/**
 * Structural type flags of a schema node. A node may carry several at once,
 * e.g. `"type": ["integer", "null"]`.
 */
export enum JsonObjectType {
  None = 0,
  Array = 1 << 0,
  Boolean = 1 << 1,
  Integer = 1 << 2,
  Null = 1 << 3,
  Number = 1 << 4,
  Object = 1 << 5,
  String = 1 << 6,
  File = 1 << 7,
}

const TYPE_NAMES = new Map<string, JsonObjectType>([
  ['array', JsonObjectType.Array],
  ['boolean', JsonObjectType.Boolean],
  ['integer', JsonObjectType.Integer],
  ['null', JsonObjectType.Null],
  ['number', JsonObjectType.Number],
  ['object', JsonObjectType.Object],
  ['string', JsonObjectType.String],
  ['file', JsonObjectType.File],
]);

/**
 * Parses the `type` keyword into a flag set. Unknown type names are ignored.
 */
export function parseObjectType(type: string | string[] | undefined): JsonObjectType {
  if (type === undefined) {
    return JsonObjectType.None;
  }

  const names = Array.isArray(type) ? type : [type];
  return names.reduce<JsonObjectType>(
    (flags, name) => flags | (TYPE_NAMES.get(name) ?? JsonObjectType.None),
    JsonObjectType.None
  );
}

export function hasFlag(type: JsonObjectType, flag: JsonObjectType): boolean {
  return flag !== JsonObjectType.None && (type & flag) === flag;
}

/**
 * Format strings the resolver distinguishes
 */
export const JsonFormatStrings = {
  Date: 'date',
  DateTime: 'date-time',
  Time: 'time',
  Duration: 'duration',
  TimeSpan: 'time-span',
  Guid: 'guid',
  Uuid: 'uuid',
  Base64: 'base64',
  Byte: 'byte',
  Decimal: 'decimal',
  Long: 'int64',
  LongLegacy: 'long',
} as const;
