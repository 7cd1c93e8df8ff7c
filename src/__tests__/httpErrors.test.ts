import { describeConstraintViolation } from '../utils/httpErrors';

describe('describeConstraintViolation', () => {
  it('names known constraints', () => {
    expect(describeConstraintViolation({ code: '23505', constraint: 'contacts_unique_primary_idx' })).toEqual({
      message: 'Company already has a primary contact',
      constraint: 'contacts_unique_primary_idx',
    });
  });

  it('maps numeric overflow to a validation message', () => {
    expect(describeConstraintViolation({ code: '22003' })).toEqual({ message: 'Numeric value is out of range' });
  });

  it('looks through wrapped driver errors', () => {
    const error = new Error('Failed query', { cause: { code: '22003' } });

    expect(describeConstraintViolation(error)).toEqual({ message: 'Numeric value is out of range' });
  });

  it('ignores codes it does not know', () => {
    expect(describeConstraintViolation({ code: 'toString' })).toBeNull();
    expect(describeConstraintViolation({ code: '42P01' })).toBeNull();
  });
});
