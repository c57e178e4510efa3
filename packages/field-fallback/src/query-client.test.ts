import { describe, expect, it } from 'vitest';
import {
  FallbackExhaustedError,
  ValidationError,
  type Transport,
  type TransportRequest,
  type Value,
} from '@ledgerlink/core';
import { MemoryInvalidFieldCache } from './cache.js';
import { RecordQueryClient } from './query-client.js';

/**
 * Backend with one entity type whose schema is `schema`
 */
function recordBackend(schema: Record<string, string>) {
  const requests: TransportRequest[] = [];
  const transport: Transport = {
    async request(request): Promise<Value> {
      requests.push(request);
      const body = request.body ?? {};

      if (request.path === '/api/v1/records/fields_get') {
        const fields: Record<string, Value> = {};
        for (const [name, type] of Object.entries(schema)) fields[name] = { type };
        return { fields };
      }

      const requested = Array.isArray(body.fields) ? body.fields : Object.keys(schema);
      for (const field of requested) {
        if (typeof field !== 'string' || !(field in schema)) {
          throw new ValidationError(
            'LL_V300',
            `Invalid field '${String(field)}' on model '${String(body.entity_type)}'`
          );
        }
      }
      const record: Record<string, Value> = {};
      for (const field of requested) {
        if (typeof field === 'string') record[field] = `${field}-1`;
      }
      return { records: [record] };
    },
  };
  return { transport, requests };
}

describe('RecordQueryClient', () => {
  it('should drop a rejected field and cache it', async () => {
    const { transport, requests } = recordBackend({ id: 'integer', name: 'char' });
    const cache = new MemoryInvalidFieldCache();
    const client = new RecordQueryClient({ transport, cache, logger: false });

    const records = await client.searchRead('widget', { fields: ['id', 'name', 'ghost_field'] });

    expect(records).toEqual([{ id: 'id-1', name: 'name-1' }]);
    expect(requests).toHaveLength(2);
    expect(requests[1]?.body).toEqual({
      entity_type: 'widget',
      domain: [],
      limit: 80,
      offset: 0,
      fields: ['id', 'name'],
    });
    expect(await cache.snapshot()).toEqual({ widget: ['ghost_field'] });
  });

  it('should send presets as field lists', async () => {
    const { transport, requests } = recordBackend({ id: 'integer', name: 'char', display_name: 'char' });
    const client = new RecordQueryClient({ transport, logger: false });

    await client.searchRead('widget', { preset: 'minimal', limit: 5, order: 'name asc' });

    expect(requests[0]?.body).toMatchObject({
      fields: ['id', 'name', 'display_name'],
      limit: 5,
      order: 'name asc',
    });
  });

  it('should omit the field list for the all preset', async () => {
    const { transport, requests } = recordBackend({ id: 'integer' });
    const client = new RecordQueryClient({ transport, logger: false });

    const records = await client.searchRead('widget', { preset: 'all' });

    expect(records).toEqual([{ id: 'id-1' }]);
    expect(requests[0]?.body).not.toHaveProperty('fields');
  });

  it('should surface invalid field errors directly when fallback is off', async () => {
    const { transport, requests } = recordBackend({ id: 'integer' });
    const client = new RecordQueryClient({ transport, logger: false });

    await expect(
      client.searchRead('widget', { fields: ['id', 'ghost_field'], useFallback: false })
    ).rejects.toThrow("Invalid field 'ghost_field' on model 'widget'");
    expect(requests).toHaveLength(1);
  });

  it('should use the schema when every fixed level fails', async () => {
    const { transport, requests } = recordBackend({ uid: 'integer', code: 'char' });
    const client = new RecordQueryClient({ transport, logger: false });

    const records = await client.searchRead('widget', { fields: ['title'] });

    expect(records).toEqual([{ uid: 'uid-1', code: 'code-1' }]);
    expect(requests.filter((r) => r.path === '/api/v1/records/fields_get')).toHaveLength(1);
  });

  it('should report exhaustion with the invalid fields', async () => {
    const { transport } = recordBackend({});
    const client = new RecordQueryClient({ transport, logger: false });

    const error = await client.searchRead('widget', { fields: ['title'] }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(FallbackExhaustedError);
    expect(error instanceof FallbackExhaustedError && error.invalidFields[0]).toBe('title');
  });

  it('should return field metadata from fieldsGet', async () => {
    const { transport, requests } = recordBackend({ id: 'integer' });
    const client = new RecordQueryClient({ transport, logger: false });

    const fields = await client.fieldsGet('widget', { attributes: ['type'] });

    expect(fields).toEqual({ id: { type: 'integer' } });
    expect(requests[0]?.body).toEqual({ entity_type: 'widget', attributes: ['type'] });
  });

  it('should reject malformed responses', async () => {
    const transport: Transport = { request: async () => ({ unexpected: true }) };
    const client = new RecordQueryClient({ transport, logger: false });

    const error = await client.searchRead('widget', { preset: 'all' }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ValidationError);
    expect(error).toMatchObject({ code: 'LL_V301' });
  });
});
