import path from 'node:path';
import { assert } from 'chai';

import { TemplateResolver } from '../src/template-resolver.js';
import { TemplateNotFoundError, ViewError } from '../src/errors.js';

import { viewsDir } from './test-utils/fixtures.js';

describe('template resolver', function () {
  const resolver = new TemplateResolver(viewsDir, '.view.js');

  it('appends the extension and joins the name to the root', function () {
    assert.strictEqual(resolver.pathFor('user/profile'), path.join(viewsDir, 'user', 'profile.view.js'));
  });

  it('resolves existing templates, including nested ones', function () {
    assert.strictEqual(resolver.resolve('greeting'), path.join(viewsDir, 'greeting.view.js'));
    assert.strictEqual(resolver.resolve('partials/card'), path.join(viewsDir, 'partials', 'card.view.js'));
  });

  it('reports existence without throwing', function () {
    assert.isTrue(resolver.exists('greeting'));
    assert.isFalse(resolver.exists('does/not/exist'));
  });

  it('does not treat a directory as a template', function () {
    const bare = new TemplateResolver(viewsDir, '');
    assert.isFalse(bare.exists('partials'));
  });

  it('throws TemplateNotFoundError carrying the full path', function () {
    try {
      resolver.resolve('does/not/exist');
      assert.fail('expected resolve to throw');
    } catch (err) {
      if (!(err instanceof TemplateNotFoundError)) throw err;
      assert.instanceOf(err, ViewError);
      assert.strictEqual(err.code, 'TEMPLATE_NOT_FOUND');
      assert.strictEqual(err.template, 'does/not/exist');
      assert.strictEqual(err.path, path.join(viewsDir, 'does', 'not', 'exist.view.js'));
      assert.strictEqual(err.message, `View file does not exist: ${err.path}`);
    }
  });

  describe('names that cannot exist', function () {
    it('treats a path running through a file as not found', function () {
      assert.isFalse(resolver.exists('greeting.view.js/x'));
      assert.throws(() => resolver.resolve('greeting.view.js/x'), TemplateNotFoundError);
    });

    it('treats a name with a NUL byte as not found', function () {
      assert.isFalse(resolver.exists('greet\u0000ing'));
      assert.throws(() => resolver.resolve('greet\u0000ing'), TemplateNotFoundError);
    });
  });

  describe('containment', function () {
    const nested = new TemplateResolver(path.join(viewsDir, 'partials'), '.view.js');

    it('does not resolve names outside the root', function () {
      assert.isTrue(nested.exists('card'));
      assert.isFalse(nested.exists('../greeting'));
      assert.isFalse(nested.exists('../partials/card'));
      assert.throws(() => nested.resolve('../greeting'), TemplateNotFoundError);
    });

    it('accepts names inside the root that start with two dots', function () {
      assert.isTrue(resolver.exists('..draft'));
      assert.strictEqual(resolver.resolve('..draft'), path.join(viewsDir, '..draft.view.js'));
    });
  });

  it('resolves a relative root against the working directory', function () {
    const relative = new TemplateResolver('views', '.view.js');
    assert.strictEqual(relative.root, path.resolve('views'));
  });
});
