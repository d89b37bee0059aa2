import assert from 'node:assert/strict'
import { describe, test } from 'node:test'
import {
    EmbeddingUnavailableError,
    InvalidQueryError,
    InvalidScopeError,
    isRecallException,
    LockTimeoutError,
    RecallException
} from '../src/exceptions/index.js'

describe('recall exceptions', () => {
    test('carry their class name and code', () => {
        const error = new InvalidScopeError('Unknown storage: nowhere', 'nowhere')
        assert.equal(error.name, 'InvalidScopeError')
        assert.equal(error.code, 'InvalidScope')
        assert.equal(error.scope, 'nowhere')
        assert.ok(error instanceof RecallException)
        assert.ok(error instanceof Error)
    })

    test('lock timeouts and embedding failures are retryable', () => {
        assert.equal(new LockTimeoutError('busy', 'work/bm-1', 50).retryable, true)
        assert.equal(new EmbeddingUnavailableError('down', 'timeout').retryable, true)
    })

    test('input errors are not retryable', () => {
        assert.equal(new InvalidQueryError('Query text is empty').retryable, false)
    })

    test('isRecallException narrows unknown errors', () => {
        assert.equal(isRecallException(new InvalidQueryError('x')), true)
        assert.equal(isRecallException(new Error('x')), false)
        assert.equal(isRecallException('x'), false)
    })
})
