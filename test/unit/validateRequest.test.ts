import test from 'node:test';
import assert from 'node:assert/strict';

import { RequestValidationError } from '../../src/errors.js';
import {
  activityParamsSchema,
  participantQuerySchema,
  validateRequest
} from '../../src/middleware/validateRequest.js';

test('validateRequest: returns the parsed value', () => {
  const query = validateRequest(participantQuerySchema, { email: 'a@mergington.edu', extra: '1' }, 'query');
  assert.deepEqual(query, { email: 'a@mergington.edu' });
});

test('validateRequest: a missing email is reported against the query', () => {
  assert.throws(
    () => validateRequest(participantQuerySchema, {}, 'query'),
    (err: unknown) => {
      assert.ok(err instanceof RequestValidationError);
      assert.equal(err.status, 422);
      assert.deepEqual(err.detail, [{ loc: ['query', 'email'], msg: 'Field required', type: 'invalid_type' }]);
      return true;
    }
  );
});

test('validateRequest: a repeated email parameter keeps the last value', () => {
  const query = validateRequest(participantQuerySchema, { email: ['a@mergington.edu', 'b@mergington.edu'] }, 'query');
  assert.deepEqual(query, { email: 'b@mergington.edu' });
});

test('validateRequest: a nested email parameter is rejected', () => {
  assert.throws(
    () => validateRequest(participantQuerySchema, { email: { first: 'a@mergington.edu' } }, 'query'),
    (err: unknown) => {
      assert.ok(err instanceof RequestValidationError);
      assert.deepEqual(err.issues, [
        { loc: ['query', 'email'], msg: 'Input should be a valid string', type: 'invalid_type' }
      ]);
      return true;
    }
  );
});

test('validateRequest: a missing activity name is reported against the path', () => {
  assert.throws(
    () => validateRequest(activityParamsSchema, {}, 'path'),
    (err: unknown) => {
      assert.ok(err instanceof RequestValidationError);
      assert.deepEqual(err.issues, [{ loc: ['path', 'activityName'], msg: 'Required', type: 'invalid_type' }]);
      return true;
    }
  );
});
