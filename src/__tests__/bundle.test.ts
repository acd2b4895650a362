import { describe, it } from 'node:test';
import * as assert from 'node:assert/strict';
import { Bundle, MAX_BUNDLE_DEPTH, isBundle } from '../bundle';
import { OscError } from '../errors';
import { Message } from '../message';
import { TimeTag } from '../time-tag';

function isCode(code: string) {
  return (err: unknown) => err instanceof OscError && err.code === code;
}

const HEADER_IMMEDIATE = [...Buffer.from('#bundle\0', 'ascii'), 0, 0, 0, 0, 0, 0, 0, 1];

/** Header + a single raw element with the given size prefix */
function withElement(size: number, element: number[]): Buffer {
  const prefix = Buffer.alloc(4);
  prefix.writeInt32BE(size, 0);
  return Buffer.concat([Buffer.from(HEADER_IMMEDIATE), prefix, Buffer.from(element)]);
}

const PING = [...Buffer.from('/a\0\0,\0\0\0', 'binary')];

describe('Bundle', () => {
  // --- Building ---

  describe('building', () => {
    it('should default to an immediate, empty bundle', () => {
      const bundle = new Bundle();
      assert.equal(bundle.timeTag.isImmediate(), true);
      assert.equal(bundle.isEmpty(), true);
      assert.equal(bundle.size, 0);
    });

    it('should keep messages and bundles in one ordered list', () => {
      const inner = new Bundle(new TimeTag(5, 0));
      const bundle = new Bundle()
        .addMessage(new Message('/one'))
        .addBundle(inner)
        .addMessage(new Message('/two'));
      assert.equal(bundle.size, 3);
      assert.deepEqual(bundle.messages().map((m) => m.getPath()), ['/one', '/two']);
      assert.equal(bundle.bundles()[0], inner);
      assert.equal(bundle.elements[1], inner);
    });

    it('should visit messages depth-first in element order', () => {
      const bundle = new Bundle()
        .addMessage(new Message('/1'))
        .addBundle(new Bundle().addMessage(new Message('/2')).addBundle(new Bundle().addMessage(new Message('/3'))))
        .addMessage(new Message('/4'));
      const seen: string[] = [];
      bundle.forEach((m) => seen.push(m.getPath()));
      assert.deepEqual(seen, ['/1', '/2', '/3', '/4']);
    });
  });

  // --- Serialization ---

  describe('serialize', () => {
    it('should write just the header when empty', () => {
      assert.deepEqual([...new Bundle().serialize()], HEADER_IMMEDIATE);
    });

    it('should write the time tag big-endian', () => {
      const out = new Bundle(new TimeTag(0x01020304, 0x05060708)).serialize();
      assert.deepEqual([...out.subarray(8, 16)], [1, 2, 3, 4, 5, 6, 7, 8]);
    });

    it('should prefix each element with its size', () => {
      const out = new Bundle().addMessage(new Message('/a')).serialize();
      assert.deepEqual([...out], [...HEADER_IMMEDIATE, 0, 0, 0, 8, ...PING]);
    });
  });

  // --- Deserialization ---

  describe('deserialize', () => {
    it('should decode nested bundles in wire order', () => {
      const original = new Bundle(new TimeTag(100, 1))
        .addMessage(new Message('/first').addInt32(1))
        .addBundle(new Bundle(new TimeTag(200, 2)).addMessage(new Message('/inner').addString('x')))
        .addMessage(new Message('/last').addFloat(0.25));

      const decoded = Bundle.deserialize(original.serialize());
      assert.ok(decoded.equals(original));
      assert.equal(decoded.timeTag.seconds, 100);
      assert.ok(decoded.elements[1] instanceof Bundle);
      assert.deepEqual(decoded.serialize(), original.serialize());
    });

    it('should reject data shorter than the header', () => {
      assert.throws(() => Bundle.deserialize(Buffer.from('#bundle\0', 'ascii')), isCode('MalformedPacket'));
    });

    it('should reject a missing magic', () => {
      const data = Buffer.from(HEADER_IMMEDIATE);
      data[1] = 0x42;
      assert.throws(() => Bundle.deserialize(data), isCode('MalformedPacket'));
    });

    it('should reject zero, undersized and oversized elements', () => {
      assert.throws(() => Bundle.deserialize(withElement(0, PING)), isCode('MalformedPacket'));
      assert.throws(() => Bundle.deserialize(withElement(4, PING)), isCode('MalformedPacket'));
      assert.throws(() => Bundle.deserialize(withElement(12, PING)), isCode('MalformedPacket'));
      assert.throws(() => Bundle.deserialize(withElement(-8, PING)), isCode('MalformedPacket'));
    });

    it('should name the element that failed', () => {
      const bad = [...Buffer.from('/a\0\0,x\0\0', 'binary')];
      assert.throws(
        () => Bundle.deserialize(withElement(8, bad)),
        (err: unknown) =>
          err instanceof OscError &&
          err.code === 'MalformedPacket' &&
          err.message.startsWith('Bundle element 0: ') &&
          err.context.element === 0,
      );
    });

    it('should reject 1-3 trailing bytes after the last element', () => {
      for (const extra of [1, 2, 3]) {
        const data = Buffer.concat([withElement(8, PING), Buffer.alloc(extra)]);
        assert.throws(
          () => Bundle.deserialize(data),
          (err: unknown) =>
            err instanceof OscError &&
            err.code === 'MalformedPacket' &&
            err.message === `Bundle has ${extra} trailing bytes`,
        );
      }
      assert.throws(() => Bundle.deserialize(Buffer.from([...HEADER_IMMEDIATE, 0])), isCode('MalformedPacket'));
    });

    it('should prefix a nested failure once, with the element path', () => {
      const data = new Bundle().addBundle(new Bundle().addMessage(new Message('/leaf'))).serialize();
      // outer header 16, size 4, inner header 16, size 4, "/leaf\0\0\0" 8, then the ','
      assert.equal(data[48], 0x2c);
      data[48] = 0x78;
      assert.throws(
        () => Bundle.deserialize(data),
        (err: unknown) =>
          err instanceof OscError &&
          err.code === 'MalformedPacket' &&
          err.message.startsWith('Bundle element 0.0: ') &&
          !err.message.includes('Bundle element 0.0: Bundle element') &&
          err.context.elementPath === '0.0',
      );
    });

    it('should cap bundle nesting depth', () => {
      const nest = (levels: number): Bundle => {
        let bundle = new Bundle().addMessage(new Message('/leaf'));
        for (let i = 1; i < levels; i++) bundle = new Bundle().addBundle(bundle);
        return bundle;
      };

      let levels = 0;
      let element: Bundle | Message = Bundle.deserialize(nest(MAX_BUNDLE_DEPTH).serialize());
      while (element instanceof Bundle) {
        levels++;
        element = element.elements[0];
      }
      assert.equal(element.getPath(), '/leaf');
      assert.equal(levels, MAX_BUNDLE_DEPTH);

      assert.throws(
        () => Bundle.deserialize(nest(MAX_BUNDLE_DEPTH + 1).serialize()),
        (err: unknown) =>
          err instanceof OscError &&
          err.code === 'MalformedPacket' &&
          err.message === `Bundle nesting exceeds ${MAX_BUNDLE_DEPTH} levels`,
      );
    });
  });

  describe('isBundle', () => {
    it('should detect the magic prefix', () => {
      assert.equal(isBundle(new Bundle().serialize()), true);
      assert.equal(isBundle(new Message('/bundle').serialize()), false);
      assert.equal(isBundle(Buffer.from('#bun', 'ascii')), false);
    });
  });

  describe('equals', () => {
    it('should compare time tag and elements', () => {
      const a = new Bundle(new TimeTag(1, 0)).addMessage(new Message('/x'));
      assert.equal(a.equals(new Bundle(new TimeTag(1, 0)).addMessage(new Message('/x'))), true);
      assert.equal(a.equals(new Bundle(new TimeTag(2, 0)).addMessage(new Message('/x'))), false);
      assert.equal(a.equals(new Bundle(new TimeTag(1, 0)).addBundle(new Bundle())), false);
    });
  });
});
