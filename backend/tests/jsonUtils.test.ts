import { describe, it, expect } from 'vitest';
import { JsonUtils } from '../utils/JsonUtils.js';

describe('JsonUtils.stripCodeFences', () => {
  it('returns the body of a json fence', () => {
    expect(JsonUtils.stripCodeFences('```json\n[{"a":1}]\n```')).toBe('[{"a":1}]');
  });

  it('returns the body of a bare fence surrounded by prose', () => {
    expect(JsonUtils.stripCodeFences('Result:\n```\n{"b":2}\n```\nDone')).toBe('{"b":2}');
  });

  it('trims text without a fence', () => {
    expect(JsonUtils.stripCodeFences('  plain  ')).toBe('plain');
  });
});

describe('JsonUtils.parseLenient', () => {
  it('parses valid JSON directly', () => {
    expect(JsonUtils.parseLenient('{"a":1}')).toEqual({ a: 1 });
  });

  it('repairs trailing commas', () => {
    expect(JsonUtils.parseLenient('[{"a":1,},]')).toEqual([{ a: 1 }]);
  });

  it('falls back to the outermost object slice', () => {
    expect(JsonUtils.parseLenient('Here you go: {"a": 2} thanks')).toEqual({ a: 2 });
  });

  it('prefers the outermost array slice', () => {
    expect(JsonUtils.parseLenient('Questions: [{"a": 1}, {"a": 2}] end')).toEqual([{ a: 1 }, { a: 2 }]);
  });

  it('returns undefined when nothing parses', () => {
    expect(JsonUtils.parseLenient('not json')).toBeUndefined();
    expect(JsonUtils.parseLenient('')).toBeUndefined();
  });
});
