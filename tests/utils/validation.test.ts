import { z } from 'zod';
import { definedOnly, parseInput, toValidationError } from '../../src/utils/validation';
import { ValidationError, isDuplicateKeyError } from '../../src/utils/errors';

describe('validation utils', () => {
  it('should group issues by field', () => {
    const schema = z.object({ name: z.string().min(2, 'Too short.') });
    const parsed = schema.safeParse({ name: 'a' });
    if (parsed.success) throw new Error('expected the parse to fail');

    const error = toValidationError(parsed.error);

    expect(error.message).toBe('name: Too short.');
    expect(error.fields).toEqual({ name: ['Too short.'] });
  });

  it('should put refinements without a path under form', () => {
    const parsed = z.string().refine(() => false, { message: 'Rejected.' }).safeParse('x');
    if (parsed.success) throw new Error('expected the parse to fail');

    const error = toValidationError(parsed.error);

    expect(error.message).toBe('Rejected.');
    expect(error.fields).toEqual({ form: ['Rejected.'] });
  });

  it('should return parsed data or throw ValidationError', () => {
    const schema = z.object({ capacity: z.coerce.number().int() });
    expect(parseInput(schema, { capacity: '4' })).toEqual({ capacity: 4 });
    expect(() => parseInput(schema, { capacity: '4.5' })).toThrow(ValidationError);
  });

  it('should drop undefined keys but keep null', () => {
    expect(definedOnly({ a: 1, b: undefined, c: null })).toEqual({ a: 1, c: null });
    expect(Object.keys(definedOnly({ a: undefined }))).toEqual([]);
  });

  it('should recognise duplicate key errors', () => {
    expect(isDuplicateKeyError({ code: 11000 })).toBe(true);
    expect(isDuplicateKeyError({ code: 121 })).toBe(false);
    expect(isDuplicateKeyError('11000')).toBe(false);
  });
});
