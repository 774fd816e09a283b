import { PipelineError } from '../../src/domain/errors';
import {
  extractJsonObject,
  extractOutermostObject,
  normalizeAttributes,
  parseStrictJsonObject,
  repairJSON,
} from '../../src/analysis/extraction';

describe('repairJSON', () => {
  it('drops trailing commas', () => {
    expect(repairJSON('{"a": [1, 2,], "b": 3,}')).toBe('{"a": [1, 2], "b": 3}');
  });

  it('escapes raw control characters inside strings only', () => {
    expect(repairJSON('{"a": "x\ny"}\n')).toBe('{"a": "x\\ny"}\n');
  });
});

describe('extractOutermostObject', () => {
  it('ignores braces inside strings', () => {
    expect(extractOutermostObject('text {"a": "}{", "b": {"c": 1}} tail')).toBe('{"a": "}{", "b": {"c": 1}}');
  });

  it('returns null when unbalanced', () => {
    expect(extractOutermostObject('{"a": 1')).toBeNull();
    expect(extractOutermostObject('no braces')).toBeNull();
  });
});

describe('parseStrictJsonObject', () => {
  it('parses a bare object', () => {
    expect(parseStrictJsonObject(' {"name":"Centrifuge"}\n')).toEqual({ name: 'Centrifuge' });
  });

  it('rejects prose around the object', () => {
    expect(() => parseStrictJsonObject('The item is {"type": "tool"}.')).toThrow('Provider response is not a single JSON object');
  });

  it('rejects a JSON array', () => {
    expect(() => parseStrictJsonObject('[{"name":"Centrifuge"}]')).toThrow('Provider response is not a single JSON object');
  });
});

describe('extractJsonObject', () => {
  it('parses a bare object', () => {
    expect(extractJsonObject('{"name":"Centrifuge","serial":"X123"}')).toEqual({ name: 'Centrifuge', serial: 'X123' });
  });

  it('unwraps a markdown fence and repairs trailing commas', () => {
    const raw = 'Here you go:\n```json\n{"name": "Centrifuge",}\n```';
    expect(extractJsonObject(raw)).toEqual({ name: 'Centrifuge' });
  });

  it('finds the object inside prose', () => {
    expect(extractJsonObject('The item is {"type": "tool"} as shown.')).toEqual({ type: 'tool' });
  });

  it('repairs raw newlines in strings', () => {
    expect(extractJsonObject('{"description": "line one\nline two"}')).toEqual({ description: 'line one\nline two' });
  });

  it('raises InvalidResponse when there is no object', () => {
    const err = (() => {
      try {
        return extractJsonObject('I cannot see anything.');
      } catch (e) {
        return e;
      }
    })();
    expect(err).toBeInstanceOf(PipelineError);
    if (err instanceof PipelineError) {
      expect(err.kind).toBe('InvalidResponse');
      expect(err.message).toBe('No JSON object found in provider response');
      expect(err.typedError.details).toEqual({ rawResponsePreview: 'I cannot see anything.' });
    }
  });

  it('raises InvalidResponse for unrepairable JSON', () => {
    expect(() => extractJsonObject('{"a": }')).toThrow('Provider response contains malformed JSON');
  });
});

describe('normalizeAttributes', () => {
  it('flattens the summary and scores known fields', () => {
    const result = normalizeAttributes({
      summary: { asset_name: 'Centrifuge', asset_type: 'equipment' },
      serial: 'X123',
      location: 'unknown',
    });
    expect(result.attributes).toEqual({ serial: 'X123', location: 'unknown', name: 'Centrifuge', type: 'equipment' });
    expect(result.confidence).toBe(0.75);
  });

  it('keeps an explicit type over the summary type', () => {
    const result = normalizeAttributes({ summary: { asset_name: 'Beaker', asset_type: 'glassware' }, type: 'consumable' });
    expect(result.attributes['type']).toBe('consumable');
  });

  it('uses a reported confidence in range', () => {
    expect(normalizeAttributes({ name: 'Centrifuge', confidence: 0.9 }).confidence).toBe(0.9);
  });

  it('ignores a reported confidence out of range', () => {
    expect(normalizeAttributes({ name: 'Centrifuge', serial: '', confidence: 7 }).confidence).toBe(0.5);
  });

  it('rejects an object with no attributes', () => {
    expect(() => normalizeAttributes({ confidence: 0.5 }, '{"confidence":0.5}')).toThrow(
      'Provider response contained no attributes',
    );
  });
});
