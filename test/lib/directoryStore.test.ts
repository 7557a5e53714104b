import { expect } from 'chai';

import { DirectoryStore, type SeedDirectory } from '../../src/lib/directoryStore';
import { AlreadyExistsError, InvalidDnSyntaxError } from '../../src/lib/errors';

describe('DirectoryStore', () => {
  const seed = (): SeedDirectory => ({
    'dc=example,dc=com': { dc: ['example'] },
    'cn=Alice,dc=example,dc=com': { cn: ['Alice'], mail: [] },
  });

  it('should find entries whatever the case or spacing of the DN', () => {
    const store = DirectoryStore.fromSeed(seed());
    expect(store.contains('CN=alice,DC=example,DC=com')).to.be.true;
    expect(store.contains('cn=alice, dc=example, dc=com')).to.be.true;
    expect(store.get('cn=ALICE,dc=example,dc=com')?.dn).to.equal(
      'cn=Alice,dc=example,dc=com'
    );
    expect(store.contains('cn=bob,dc=example,dc=com')).to.be.false;
  });

  it('should store text seed values as UTF-8 bytes and drop empty attributes', () => {
    const store = DirectoryStore.fromSeed(seed());
    const entry = store.get('cn=alice,dc=example,dc=com')?.entry;
    expect(entry?.get('cn')).to.deep.equal([Buffer.from('Alice')]);
    expect(entry?.has('mail')).to.be.false;
  });

  it('should not alias the seed data', () => {
    const value = Buffer.from('example');
    const data: SeedDirectory = { 'dc=example,dc=com': { dc: [value] } };
    const store = DirectoryStore.fromSeed(data);
    value.write('EX');
    data['dc=example,dc=com'].dc = [];
    expect(store.get('dc=example,dc=com')?.entry.getText('dc')).to.deep.equal([
      'example',
    ]);
  });

  it('should reject DNs differing only in case', () => {
    expect(() =>
      DirectoryStore.fromSeed({ 'dc=com': {}, 'DC=COM': {} })
    ).to.throw(AlreadyExistsError);
  });

  it('should reject a malformed DN', () => {
    expect(() => DirectoryStore.fromSeed({ 'not a dn': {} })).to.throw(
      InvalidDnSyntaxError
    );
  });

  it('should put, list and remove entries', () => {
    const store = DirectoryStore.fromSeed(seed());
    const moved = store.get('cn=alice,dc=example,dc=com');
    expect(moved).to.not.be.undefined;
    if (!moved) return;
    store.put('cn=Al,dc=example,dc=com', moved.entry);
    expect(store.remove('cn=alice,dc=example,dc=com')).to.be.true;
    expect(store.remove('cn=alice,dc=example,dc=com')).to.be.false;
    expect([...store.keys()]).to.deep.equal([
      'dc=example,dc=com',
      'cn=Al,dc=example,dc=com',
    ]);
    expect(store.size).to.equal(2);
  });

  it('should snapshot the tree as plain objects', () => {
    const store = DirectoryStore.fromSeed(seed());
    expect(store.snapshot()).to.deep.equal({
      'dc=example,dc=com': { dc: [Buffer.from('example')] },
      'cn=Alice,dc=example,dc=com': { cn: [Buffer.from('Alice')] },
    });
  });
});
