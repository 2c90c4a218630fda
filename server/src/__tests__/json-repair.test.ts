import { describe, it, expect } from 'vitest';
import { repairJSON } from '../lib/json-repair.js';

describe('repairJSON', () => {
  it('returns null for large inputs that exceed the 50KB threshold', () => {
    // Build a string that is > 50_000 chars and contains invalid JSON
    // so earlier parse steps all fail before hitting the size check.
    // We construct an unclosed object so JSON.parse fails, then pad it
    // well beyond 50KB.
    const invalid = '{' + 'x'.repeat(60_000);

    const result = repairJSON(invalid);

    expect(result).toBeNull();
  });

  it('parses valid JSON of normal size without modification', () => {
    const input = '{"key": "value", "count": 42}';

    const result = repairJSON(input);

    expect(result).toEqual({ key: 'value', count: 42 });
  });

  it('repairs a trailing comma inside an object', () => {
    const input = '{"key": "value",}';

    const result = repairJSON(input);

    expect(result).toEqual({ key: 'value' });
  });

  it('repairs a trailing comma inside an array', () => {
    const input = '["a", "b", "c",]';

    const result = repairJSON(input);

    expect(result).toEqual(['a', 'b', 'c']);
  });

  it('strips markdown json fences before parsing', () => {
    const input = '```json\n{"answer": true}\n```';

    const result = repairJSON(input);

    expect(result).toEqual({ answer: true });
  });

  it('returns null for input that cannot be repaired', () => {
    // Not JSON at all, and small enough to reach every step
    const result = repairJSON('this is just plain text with no JSON');

    expect(result).toBeNull();
  });

  it('extracts the object from surrounding prose', () => {
    const input = 'Here is the score:\n{"score.context": {"score": 4}}\nLet me know if you need more.';

    expect(repairJSON(input)).toEqual({ 'score.context': { score: 4 } });
  });

  it('closes a reply truncated mid-object', () => {
    const input = '{"star.example": {"situation": "Night shift cover", "result": "Fewer gaps"';

    expect(repairJSON(input)).toEqual({ 'star.example': { situation: 'Night shift cover', result: 'Fewer gaps' } });
  });

  it('quotes bare keys', () => {
    expect(repairJSON('{approved: true, overall_quality: 8}')).toEqual({ approved: true, overall_quality: 8 });
  });
});
