import { assert } from 'chai';

import { OutputCapture, type FrameHandle } from '../src/output-capture.js';
import { CaptureImbalanceError } from '../src/errors.js';

import { collectingSink } from './test-utils/fixtures.js';

describe('output capture', function () {
  it('writes straight to the sink while no frame is open', function () {
    const sink = collectingSink();
    const capture = new OutputCapture(sink);

    capture.write('a');
    capture.write('b');

    assert.deepEqual(sink.chunks, [ 'a', 'b' ]);
    assert.strictEqual(capture.depth, 0);
  });

  it('does not forward empty writes', function () {
    const sink = collectingSink();
    new OutputCapture(sink).write('');
    assert.deepEqual(sink.chunks, []);
  });

  it('collects text written while a frame is open', function () {
    const sink = collectingSink();
    const capture = new OutputCapture(sink);

    const frame = capture.open();
    capture.write('hello ');
    capture.write('world');

    assert.strictEqual(capture.depth, 1);
    assert.strictEqual(capture.close(frame), 'hello world');
    assert.strictEqual(capture.depth, 0);
    assert.deepEqual(sink.chunks, []);
  });

  it('keeps nested frames strictly separate', function () {
    const capture = new OutputCapture(collectingSink());

    const outer = capture.open();
    capture.write('outer-1 ');
    const inner = capture.open();
    capture.write('inner');
    const innerText = capture.close(inner);
    capture.write('outer-2');
    const outerText = capture.close(outer);

    assert.strictEqual(innerText, 'inner');
    assert.strictEqual(outerText, 'outer-1 outer-2');
  });

  it('yields one string per frame for any nesting depth', function () {
    const capture = new OutputCapture(collectingSink());
    const depth = 6;

    const handles: FrameHandle[] = [];
    for (let i = 0; i < depth; i++) {
      handles.push(capture.open());
      capture.write(`level${i}`);
    }
    assert.strictEqual(capture.depth, depth);

    const texts: string[] = [];
    for (let i = depth - 1; i >= 0; i--) {
      texts.push(capture.close(handles[i]));
    }

    assert.deepEqual(texts, [ 'level5', 'level4', 'level3', 'level2', 'level1', 'level0' ]);
    assert.strictEqual(capture.depth, 0);
  });

  it('gives each frame a distinct handle', function () {
    const capture = new OutputCapture(collectingSink());
    const a = capture.open();
    const b = capture.open();

    assert.notStrictEqual(a.id, b.id);
    assert.strictEqual(a.depth, 1);
    assert.strictEqual(b.depth, 2);
    assert.isTrue(Object.isFrozen(a));
  });

  describe('imbalance', function () {
    it('rejects closing an outer frame while an inner one is open', function () {
      const capture = new OutputCapture(collectingSink());
      const outer = capture.open();
      capture.open();

      assert.throws(() => capture.close(outer), CaptureImbalanceError, /still open/);
      assert.strictEqual(capture.depth, 2);
    });

    it('rejects closing a frame twice', function () {
      const capture = new OutputCapture(collectingSink());
      const frame = capture.open();
      capture.close(frame);

      assert.throws(() => capture.close(frame), CaptureImbalanceError, /no frame is open/);
    });

    it('carries an error code', function () {
      const capture = new OutputCapture(collectingSink());
      const frame = capture.open();
      capture.close(frame);

      try {
        capture.close(frame);
        assert.fail('expected close to throw');
      } catch (err) {
        if (!(err instanceof CaptureImbalanceError)) throw err;
        assert.strictEqual(err.code, 'CAPTURE_IMBALANCE');
        assert.strictEqual(err.depth, 0);
      }
    });
  });

  describe('capture()', function () {
    it('returns what the callback wrote', function () {
      const capture = new OutputCapture(collectingSink());
      const text = capture.capture(() => {
        capture.write('inside');
      });

      assert.strictEqual(text, 'inside');
      assert.strictEqual(capture.depth, 0);
    });

    it('releases the frame and rethrows when the callback fails', function () {
      const sink = collectingSink();
      const capture = new OutputCapture(sink);
      const failure = new Error('boom');

      assert.throws(() => capture.capture(() => {
        capture.write('partial');
        throw failure;
      }), failure);

      assert.strictEqual(capture.depth, 0);
      // the partial output is dropped, not flushed
      assert.deepEqual(sink.chunks, []);
    });

    it('drops frames a failing callback left open', function () {
      const capture = new OutputCapture(collectingSink());
      const outer = capture.open();

      assert.throws(() => capture.capture(() => {
        capture.open();
        capture.open();
        throw new Error('abort');
      }), 'abort');

      assert.strictEqual(capture.depth, 1);
      capture.write('still outer');
      assert.strictEqual(capture.close(outer), 'still outer');
    });

    it('nests', function () {
      const capture = new OutputCapture(collectingSink());
      let inner = '';
      const outer = capture.capture(() => {
        capture.write('[');
        inner = capture.capture(() => {
          capture.write('inner');
        });
        capture.write(']');
      });

      assert.strictEqual(inner, 'inner');
      assert.strictEqual(outer, '[]');
    });
  });
});
