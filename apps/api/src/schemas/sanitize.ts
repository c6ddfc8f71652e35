import type { JsonObject, JsonValue } from '../types.js';

// Keywords whose value is a map of name -> subschema.
const SCHEMA_MAP_KEYWORDS = ['properties', 'patternProperties', '$defs', 'definitions'] as const;
// Keywords whose value is a list of subschemas.
const SCHEMA_LIST_KEYWORDS = ['anyOf', 'oneOf', 'allOf', 'prefixItems'] as const;
// Keywords whose value is a single subschema (or, for items, possibly a list).
const SCHEMA_SINGLE_KEYWORDS = ['items', 'not', 'additionalProperties'] as const;

function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep-copies an arbitrary value into plain JSON, dropping anything JSON
 * cannot carry (undefined, functions, symbols, non-finite numbers).
 */
export function toJsonValue(value: unknown): JsonValue | undefined {
  if (value === null) return null;
  if (typeof value === 'string' || typeof value === 'boolean') return value;
  if (typeof value === 'number') return Number.isFinite(value) ? value : undefined;
  if (Array.isArray(value)) {
    const items: JsonValue[] = [];
    for (const item of value) {
      const converted = toJsonValue(item);
      items.push(converted === undefined ? null : converted);
    }
    return items;
  }
  if (typeof value === 'object') {
    const out: JsonObject = {};
    for (const [key, entry] of Object.entries(value)) {
      const converted = toJsonValue(entry);
      if (converted !== undefined) out[key] = converted;
    }
    return out;
  }
  return undefined;
}

export function toJsonObject(value: unknown): JsonObject {
  const converted = toJsonValue(value);
  return isJsonObject(converted) ? converted : {};
}

function isObjectTyped(node: JsonObject): boolean {
  const type = node.type;
  if (type === 'object') return true;
  if (Array.isArray(type) && type.includes('object')) return true;
  return type === undefined && isJsonObject(node.properties);
}

function admitsNull(node: JsonValue): boolean {
  if (!isJsonObject(node)) return false;
  const type = node.type;
  if (type === 'null') return true;
  if (Array.isArray(type) && type.includes('null')) return true;
  for (const keyword of ['anyOf', 'oneOf'] as const) {
    const options = node[keyword];
    if (Array.isArray(options) && options.some((option) => admitsNull(option))) return true;
  }
  return false;
}

function sanitizeNode(value: JsonValue): JsonValue {
  if (Array.isArray(value)) return value.map(sanitizeNode);
  if (!isJsonObject(value)) return value;

  const node: JsonObject = { ...value };

  if (node.format === 'uri') {
    delete node.format;
  }

  for (const keyword of SCHEMA_MAP_KEYWORDS) {
    const map = node[keyword];
    if (!isJsonObject(map)) continue;
    const next: JsonObject = {};
    for (const [name, subschema] of Object.entries(map)) {
      next[name] = sanitizeNode(subschema);
    }
    node[keyword] = next;
  }

  for (const keyword of SCHEMA_LIST_KEYWORDS) {
    const list = node[keyword];
    if (Array.isArray(list)) node[keyword] = list.map(sanitizeNode);
  }

  for (const keyword of SCHEMA_SINGLE_KEYWORDS) {
    const subschema = node[keyword];
    if (isJsonObject(subschema) || Array.isArray(subschema)) {
      node[keyword] = sanitizeNode(subschema);
    }
  }

  if (isObjectTyped(node)) {
    const properties = isJsonObject(node.properties) ? node.properties : {};
    const previouslyRequired = new Set(
      Array.isArray(node.required) ? node.required.filter((r): r is string => typeof r === 'string') : []
    );

    // Strict providers want every property listed; optional ones stay optional by admitting null.
    const names = Object.keys(properties);
    for (const name of names) {
      const property = properties[name];
      if (!previouslyRequired.has(name) && !admitsNull(property)) {
        properties[name] = { anyOf: [property, { type: 'null' }] };
      }
    }

    node.required = names;
    node.additionalProperties = false;
  }

  return node;
}

/**
 * Rewrites a JSON schema into the subset accepted by strict
 * structured-output providers (OpenAI strict mode, Azure OpenAI):
 * no `uri` string formats, closed objects, and every property required.
 * Returns a new schema; the input is left untouched.
 */
export function sanitizeJsonSchema(schema: JsonObject): JsonObject {
  const sanitized = sanitizeNode(toJsonObject(schema));
  return isJsonObject(sanitized) ? sanitized : {};
}
