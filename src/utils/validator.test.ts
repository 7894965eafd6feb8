import type { StandardSchemaV1 } from '@standard-schema/spec';
import { describe, expect, it } from 'vitest';
import z from 'zod';
import { ValidationError } from '../error/validationError.js';
import { validator } from './validator.js';

describe('validator', () => {
  it('resolves to the parsed value for valid input', async () => {
    const data = { foo: 'bar' };
    const schema = z.object({ foo: z.string() });
    const [err, parsed] = await validator(data, schema);

    expect(err).toBeNull();
    expect(parsed).toEqual(data);
  });

  it('returns the issues for invalid input', async () => {
    const schema = z.object({ foo: z.string() });
    const [err, parsed] = await validator({ foo: 1 }, schema);

    expect(parsed).toBeNull();
    expect(err).toBeInstanceOf(ValidationError);
    expect(err?.issues).toHaveLength(1);
    expect(err?.issues[0]?.path).toEqual(['foo']);
    expect(err?.message.startsWith('error validating data; issues: ')).toBe(true);
  });

  it('returns error when async validation throws', async () => {
    const schema: StandardSchemaV1<unknown, string> = {
      // @ts-expect-error - minimal runtime shape for the test
      '~standard': {
        validate: async () => {
          throw new Error('oops');
        },
      },
    };

    const [err, value] = await validator({}, schema);

    expect(value).toBeNull();
    expect(err).toBeInstanceOf(ValidationError);
    expect(err?.message).toBe('error in async schema validation; issues: []');
    expect(err?.cause).toEqual(new Error('oops'));
  });

  it('returns error when sync validation throws', async () => {
    const schema: StandardSchemaV1<unknown, string> = {
      // @ts-expect-error - minimal runtime shape for the test
      '~standard': {
        validate: () => {
          throw new Error('oops');
        },
      },
    };

    const [err, value] = await validator({}, schema);

    expect(value).toBeNull();
    expect(err).toBeInstanceOf(ValidationError);
    expect(err?.message).toBe('error starting schema validation; issues: []');
    expect(err?.cause).toEqual(new Error('oops'));
  });

  it('returns error when validation returns an empty result', async () => {
    const schema: StandardSchemaV1<unknown, string> = {
      '~standard': {
        version: 1,
        vendor: 'test',
        // @ts-expect-error - deliberately violating the contract
        validate: () => null,
      },
    };

    const [err, value] = await validator('test', schema);

    expect(value).toBeNull();
    expect(err?.message).toBe('error schema validation returned no result; issues: []');
  });

  it('resolves the value of an async validation result', async () => {
    const schema: StandardSchemaV1<unknown, string> = {
      '~standard': {
        version: 1,
        vendor: 'test',
        validate: async (input) => ({ value: String(input) }),
      },
    };

    const [err, value] = await validator('test', schema);

    expect(err).toBeNull();
    expect(value).toBe('test');
  });
});
