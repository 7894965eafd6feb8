import { describe, expect, test } from 'vitest';
import { ArgumentError } from '../error/argumentError.js';
import { RequestOptions } from './options.js';

describe('RequestOptions', () => {
  test('empty() is a shared singleton with nothing set', () => {
    const empty = RequestOptions.empty();

    expect(RequestOptions.empty()).toBe(empty);
    expect(empty.queryParameters.size).toBe(0);
    expect(empty.headers.size).toBe(0);
    expect(empty.body).toBeNull();
    expect(empty.timeout).toBeNull();
  });

  test('an untouched builder builds the empty singleton', () => {
    expect(RequestOptions.builder().build()).toBe(RequestOptions.empty());
  });

  test('queryParam appends values in call order', () => {
    const options = RequestOptions.builder()
      .queryParam('tag', 'a')
      .queryParam('page', '1')
      .queryParam('tag', 'b')
      .build();

    expect(options.queryParameters).toEqual(
      new Map([
        ['tag', ['a', 'b']],
        ['page', ['1']],
      ]),
    );
  });

  test('header overwrites, last write wins', () => {
    const options = RequestOptions.builder()
      .header('X-Trace', 'first')
      .headers({ 'X-Trace': 'second', Accept: 'text/plain' })
      .build();

    expect(options.headers).toEqual(
      new Map([
        ['X-Trace', 'second'],
        ['Accept', 'text/plain'],
      ]),
    );
  });

  test('body and timeout are kept, and null clears them', () => {
    const set = RequestOptions.builder().body('{"a":1}').timeout(500).build();
    const cleared = RequestOptions.builder().body('{"a":1}').body(null).timeout(500).timeout(null).build();

    expect(set.body).toBe('{"a":1}');
    expect(set.timeout).toBe(500);
    expect(cleared).toBe(RequestOptions.empty());
  });

  test('built values do not change with the builder', () => {
    const builder = RequestOptions.builder().queryParam('page', '1').header('X-Trace', 'a');
    const options = builder.build();

    builder.queryParam('page', '2').header('X-Trace', 'b').body('late');

    expect(options.queryParameters.get('page')).toEqual(['1']);
    expect(options.headers.get('X-Trace')).toBe('a');
    expect(options.body).toBeNull();
  });

  test('rejects a non-positive timeout', () => {
    expect(() => RequestOptions.builder().timeout(0)).toThrow(
      new ArgumentError('Timeout must be a positive number of milliseconds, got 0', 'Timeout'),
    );
  });

  test('rejects a missing query parameter value', () => {
    // @ts-expect-error - value is required
    expect(() => RequestOptions.builder().queryParam('page', undefined)).toThrow('Query parameter value is required');
  });
});
