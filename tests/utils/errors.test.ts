import assert from 'node:assert/strict';
import { describe, it } from 'node:test';
import { ErrorCodes } from '../../src/types/index.js';
import { ConfigError, ConstraintParseError, ValidationError, handleError } from '../../src/utils/errors.js';

describe('Errors', () => {
  it('carries a code and details', () => {
    const error = new ConstraintParseError('>>1', 'bad version');
    assert.equal(error.code, ErrorCodes.INVALID_CONSTRAINT);
    assert.deepStrictEqual(error.details, { constraint: '>>1', reason: 'bad version' });
    assert.equal(new ConfigError('broken').code, ErrorCodes.CONFIG_ERROR);
  });

  it('maps any thrown value to a failed command result', () => {
    assert.deepStrictEqual(handleError(new ValidationError('no packages')), {
      success: false,
      error: 'Validation error: no packages'
    });
    assert.deepStrictEqual(handleError(new Error('boom')), { success: false, error: 'boom' });
    assert.deepStrictEqual(handleError('boom'), { success: false, error: 'An unknown error occurred' });
  });
});
