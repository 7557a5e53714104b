import { expect } from 'chai';

import { AsyncResultQueue } from '../../src/lib/asyncResults';

describe('AsyncResultQueue', () => {
  it('should hand out increasing tickets from zero', () => {
    const queue = new AsyncResultQueue<string>();
    expect(queue.push('a')).to.equal(0);
    expect(queue.push('b')).to.equal(1);
    expect(queue.length).to.equal(2);
  });

  it('should give a result once', () => {
    const queue = new AsyncResultQueue<string>();
    const ticket = queue.push('a');
    expect(queue.pop(ticket)).to.equal('a');
    expect(queue.pop(ticket)).to.be.null;
  });

  it('should not reuse tickets after a pop', () => {
    const queue = new AsyncResultQueue<string>();
    queue.pop(queue.push('a'));
    expect(queue.push('b')).to.equal(1);
  });

  it('should return null for unknown tickets', () => {
    const queue = new AsyncResultQueue<string>();
    queue.push('a');
    expect(queue.pop(1)).to.be.null;
    expect(queue.pop(-1)).to.be.null;
    expect(queue.pop(0.5)).to.be.null;
    expect(queue.pop(0)).to.equal('a');
  });
});
