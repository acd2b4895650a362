import { describe, it } from 'node:test';
import * as assert from 'node:assert/strict';
import { PacketQueue } from '../transport/packet-queue';

function packet(n: number): Buffer {
  return Buffer.from([n]);
}

describe('PacketQueue', () => {
  it('should start empty', () => {
    const q = new PacketQueue(4);
    assert.equal(q.size, 0);
    assert.equal(q.empty, true);
    assert.equal(q.shift(), undefined);
  });

  it('should return packets in FIFO order', () => {
    const q = new PacketQueue(4);
    q.push(packet(1), 'a');
    q.push(packet(2), 'b');
    q.push(packet(3), 'c');
    assert.equal(q.size, 3);
    assert.equal(q.shift()?.source, 'a');
    assert.equal(q.shift()?.source, 'b');
    assert.equal(q.shift()?.source, 'c');
    assert.equal(q.empty, true);
  });

  it('should evict and return the oldest packet when full', () => {
    const q = new PacketQueue(2);
    assert.equal(q.push(packet(1), 'a'), undefined);
    assert.equal(q.push(packet(2), 'b'), undefined);
    const evicted = q.push(packet(3), 'c');
    assert.equal(evicted?.source, 'a');
    assert.equal(q.size, 2);
    assert.deepEqual([q.shift()?.source, q.shift()?.source], ['b', 'c']);
  });

  it('should keep order across wrap-around', () => {
    const q = new PacketQueue(3);
    q.push(packet(1), '1');
    q.push(packet(2), '2');
    q.shift();
    q.push(packet(3), '3');
    q.push(packet(4), '4');
    assert.deepEqual([q.shift()?.data[0], q.shift()?.data[0], q.shift()?.data[0]], [2, 3, 4]);
  });

  it('should record the receive time', () => {
    const q = new PacketQueue(1);
    q.push(packet(1), 'x', 12345);
    assert.equal(q.shift()?.receivedAt, 12345);
  });

  it('should clear', () => {
    const q = new PacketQueue(2);
    q.push(packet(1), 'a');
    q.clear();
    assert.equal(q.size, 0);
    assert.equal(q.shift(), undefined);
  });

  it('should reject a non-positive capacity', () => {
    assert.throws(() => new PacketQueue(0), RangeError);
  });
});
