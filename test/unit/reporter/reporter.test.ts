import { describe, it, expect } from 'vitest';
import { createReporter } from '../../../src/reporter/reporter.js';
import { TextReporter } from '../../../src/reporter/text-reporter.js';
import { JsonReporter } from '../../../src/reporter/json-reporter.js';

describe('createReporter', () => {
  it('should create TextReporter for text format', () => {
    expect(createReporter('text')).toBeInstanceOf(TextReporter);
  });

  it('should create JsonReporter for json format', () => {
    expect(createReporter('json')).toBeInstanceOf(JsonReporter);
  });
});
