import {
  CpmmCalculatorError,
  InvalidArgumentError,
  ValidationError,
  mapError,
} from '../src/errors';

describe('error hierarchy', () => {
  it('subclasses keep their codes and names', () => {
    const invalid = new InvalidArgumentError('price must be strictly positive');
    expect(invalid).toBeInstanceOf(CpmmCalculatorError);
    expect(invalid).toBeInstanceOf(Error);
    expect(invalid.code).toBe('INVALID_ARGUMENT');
    expect(invalid.name).toBe('InvalidArgumentError');

    const validation = new ValidationError('feePercent must be less than 100');
    expect(validation).toBeInstanceOf(CpmmCalculatorError);
    expect(validation.code).toBe('VALIDATION_ERROR');
    expect(validation.name).toBe('ValidationError');
  });

  it('serializes to the Result error shape', () => {
    expect(new ValidationError('bad', { field: 'decades' }).toJSON()).toEqual({
      code: 'VALIDATION_ERROR',
      message: 'bad',
      details: { field: 'decades' },
    });
    expect(new InvalidArgumentError('bad').toJSON()).toEqual({
      code: 'INVALID_ARGUMENT',
      message: 'bad',
    });
  });
});

describe('mapError', () => {
  it('passes calculator errors through', () => {
    const err = new InvalidArgumentError('liquidity must be strictly positive');
    expect(mapError(err)).toBe(err);
  });

  it('wraps plain errors as UNKNOWN_ERROR', () => {
    const original = new Error('boom');
    const mapped = mapError(original);
    expect(mapped.code).toBe('UNKNOWN_ERROR');
    expect(mapped.message).toBe('boom');
    expect(mapped.details).toEqual({ originalError: original });
  });

  it('wraps non-error values', () => {
    const mapped = mapError('something odd');
    expect(mapped).toBeInstanceOf(CpmmCalculatorError);
    expect(mapped.message).toBe('something odd');
  });
});
