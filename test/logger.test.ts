import { assert } from 'chai';

import { resolveLogLevel } from '../src/logger.js';

describe('logger', function () {
  describe('resolveLogLevel()', function () {
    it('uses a level pino knows', function () {
      assert.strictEqual(resolveLogLevel('warn', 'production'), 'warn');
      assert.strictEqual(resolveLogLevel('trace', undefined), 'trace');
      assert.strictEqual(resolveLogLevel('silent', undefined), 'silent');
    });

    it('falls back to the default for unknown levels', function () {
      assert.strictEqual(resolveLogLevel('verbose', 'production'), 'info');
      assert.strictEqual(resolveLogLevel('verbose', 'staging'), 'debug');
      assert.strictEqual(resolveLogLevel('toString', undefined), 'debug');
    });

    it('defaults by environment when unset', function () {
      assert.strictEqual(resolveLogLevel(undefined, 'production'), 'info');
      assert.strictEqual(resolveLogLevel(undefined, 'development'), 'debug');
      assert.strictEqual(resolveLogLevel(undefined, undefined), 'debug');
    });
  });
});
