import { describe, expect, it } from 'vitest';
import { consistencyJsonSchema, listingJsonSchema } from '../src/schemas/listing.js';
import { sanitizeJsonSchema } from '../src/schemas/sanitize.js';
import type { JsonObject, JsonValue } from '../src/types.js';

const contactSchema: JsonObject = {
  type: 'object',
  properties: {
    name: { type: 'string' },
    homepage: { type: 'string', format: 'uri' },
    seen: { type: 'string', format: 'date-time' },
    tags: {
      type: 'array',
      items: { type: 'object', properties: { label: { type: 'string' } } }
    }
  },
  required: ['name']
};

function objectNodes(value: JsonValue, out: JsonObject[] = []): JsonObject[] {
  if (Array.isArray(value)) {
    for (const item of value) objectNodes(item, out);
  } else if (typeof value === 'object' && value !== null) {
    if (value.type === 'object') out.push(value);
    for (const child of Object.values(value)) objectNodes(child, out);
  }
  return out;
}

describe('sanitizeJsonSchema', () => {
  it('closes objects, requires every property and lets optional ones be null', () => {
    expect(sanitizeJsonSchema(contactSchema)).toEqual({
      type: 'object',
      properties: {
        name: { type: 'string' },
        homepage: { anyOf: [{ type: 'string' }, { type: 'null' }] },
        seen: { anyOf: [{ type: 'string', format: 'date-time' }, { type: 'null' }] },
        tags: {
          anyOf: [
            {
              type: 'array',
              items: {
                type: 'object',
                properties: { label: { anyOf: [{ type: 'string' }, { type: 'null' }] } },
                required: ['label'],
                additionalProperties: false
              }
            },
            { type: 'null' }
          ]
        }
      },
      required: ['name', 'homepage', 'seen', 'tags'],
      additionalProperties: false
    });
  });

  it('strips uri formats nested in anyOf', () => {
    const schema: JsonObject = {
      type: 'object',
      properties: { link: { anyOf: [{ type: 'string', format: 'uri' }, { type: 'null' }] } }
    };
    expect(sanitizeJsonSchema(schema).properties).toEqual({
      link: { anyOf: [{ type: 'string' }, { type: 'null' }] }
    });
  });

  it('does not wrap optional properties that already admit null', () => {
    const schema: JsonObject = {
      type: 'object',
      properties: { note: { type: ['string', 'null'] } }
    };
    expect(sanitizeJsonSchema(schema).properties).toEqual({ note: { type: ['string', 'null'] } });
  });

  it('is idempotent', () => {
    const once = sanitizeJsonSchema(contactSchema);
    expect(sanitizeJsonSchema(once)).toEqual(once);

    const listing = sanitizeJsonSchema(listingJsonSchema());
    expect(sanitizeJsonSchema(listing)).toEqual(listing);
  });

  it('leaves its input untouched', () => {
    sanitizeJsonSchema(contactSchema);
    expect(contactSchema.required).toEqual(['name']);
    expect(contactSchema.properties).toHaveProperty('homepage.format', 'uri');
  });

  it('makes every object node in the generated schemas strict', () => {
    for (const schema of [listingJsonSchema(), consistencyJsonSchema()]) {
      const nodes = objectNodes(sanitizeJsonSchema(schema));
      expect(nodes.length).toBeGreaterThan(0);
      for (const node of nodes) {
        const properties = node.properties;
        const names = typeof properties === 'object' && properties !== null && !Array.isArray(properties)
          ? Object.keys(properties)
          : [];
        expect(node.required).toEqual(names);
        expect(node.additionalProperties).toBe(false);
      }
    }
  });

  it('never leaves a uri format in the listing schema', () => {
    expect(JSON.stringify(sanitizeJsonSchema(listingJsonSchema()))).not.toContain('"format":"uri"');
  });
});
