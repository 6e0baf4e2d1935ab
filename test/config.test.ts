import path from 'node:path';
import { assert } from 'chai';

import { loadViewConfig } from '../src/config.js';
import { InvalidViewConfigError } from '../src/errors.js';

describe('view config', function () {
  const cwd = path.resolve('/srv/app');

  it('applies defaults', function () {
    assert.deepEqual(loadViewConfig({}, cwd), {
      viewsDirectory: path.join(cwd, 'views'),
      extension: '.view.js',
      cache: false,
      timeoutMs: undefined,
    });
  });

  it('caches compiled templates in production by default', function () {
    assert.isTrue(loadViewConfig({ NODE_ENV: 'production' }, cwd).cache);
    assert.isFalse(loadViewConfig({ NODE_ENV: 'test' }, cwd).cache);
  });

  it('reads overrides from the environment', function () {
    const config = loadViewConfig({
      VIEWS_DIRECTORY: 'templates',
      VIEW_EXTENSION: '.tpl.js',
      VIEW_CACHE: '1',
      VIEW_TIMEOUT_MS: '250',
      NODE_ENV: 'development',
    }, cwd);

    assert.deepEqual(config, {
      viewsDirectory: path.join(cwd, 'templates'),
      extension: '.tpl.js',
      cache: true,
      timeoutMs: 250,
    });
  });

  it('lets VIEW_CACHE win over NODE_ENV', function () {
    assert.isFalse(loadViewConfig({ NODE_ENV: 'production', VIEW_CACHE: 'false' }, cwd).cache);
  });

  it('keeps an absolute views directory', function () {
    const dir = path.resolve('/var/views');
    assert.strictEqual(loadViewConfig({ VIEWS_DIRECTORY: dir }, cwd).viewsDirectory, dir);
  });

  it('accepts any NODE_ENV and caches only in production', function () {
    assert.isFalse(loadViewConfig({ NODE_ENV: 'staging' }, cwd).cache);
    assert.isFalse(loadViewConfig({ NODE_ENV: '' }, cwd).cache);
  });

  it('ignores unrelated variables', function () {
    assert.strictEqual(loadViewConfig({ PATH: '/usr/bin', HOME: '/root' }, cwd).extension, '.view.js');
  });

  it('rejects unusable values with every issue listed', function () {
    try {
      loadViewConfig({ VIEW_EXTENSION: 'js', VIEW_TIMEOUT_MS: '-5', VIEW_CACHE: 'yes' }, cwd);
      assert.fail('expected loadViewConfig to throw');
    } catch (err) {
      if (!(err instanceof InvalidViewConfigError)) throw err;
      assert.strictEqual(err.code, 'INVALID_VIEW_CONFIG');
      assert.lengthOf(err.issues, 3);
      assert.include(err.issues[0], 'VIEW_EXTENSION: must start with a dot');
      assert.match(err.issues[1], /^VIEW_CACHE: /);
      assert.match(err.issues[2], /^VIEW_TIMEOUT_MS: /);
    }
  });
});
