import {
  announceListField,
  bytesField,
  dictField,
  integerField,
  nodeListField,
  stringField,
  timestampField,
  urlField,
  urlListField,
} from '../../src/fields/fields';
import {
  ConversionError,
  EmptyValueError,
  FieldRangeError,
  IllFormedUrlError,
  TextDecodeError,
} from '../../src/errors';
import { CP1251_HELLO, TestHost, utf8 } from './TestHost';

describe('integerField', () => {
  it('applies its bounds on load', () => {
    const attr = integerField('private', { min: 0, max: 1 });
    const host = new TestHost([['private', 2]]);
    expect(() => attr.get(host)).toThrow(FieldRangeError);
    expect(() => attr.get(host)).toThrow('private: expected 2 to be at most 1');
  });

  it('keeps big integers', () => {
    const attr = integerField('size');
    expect(attr.get(new TestHost([['size', 2n ** 64n]]))).toBe(18446744073709551616n);
  });
});

describe('bytesField', () => {
  it('rejects empty byte strings', () => {
    const attr = bytesField('pieces');
    expect(() => attr.get(new TestHost([['pieces', new Uint8Array()]]))).toThrow(
      'pieces: empty value is not allowed',
    );
  });
});

describe('stringField', () => {
  it('decodes UTF-8 by default', () => {
    const attr = stringField('comment');
    expect(attr.get(new TestHost([['comment', utf8('héllo')]]))).toBe('héllo');
  });

  it('reports the encodings it tried', () => {
    const attr = stringField('comment');
    const run = () => attr.get(new TestHost([['comment', CP1251_HELLO]]));
    expect(run).toThrow(TextDecodeError);
    expect(run).toThrow('comment: cannot decode bytes 0xcff0e8e2e5f2 as utf-8');
  });

  it('uses the record encoding first', () => {
    const attr = stringField('comment');
    const host = new TestHost([['comment', CP1251_HELLO]]);
    host.context = { encoding: 'windows-1251', codepage: null, fallbackEncoding: null };
    expect(attr.get(host)).toBe('Привет');
  });

  it('uses the codepage', () => {
    const attr = stringField('comment');
    const host = new TestHost([['comment', CP1251_HELLO]]);
    host.context = { encoding: null, codepage: 1251, fallbackEncoding: null };
    expect(attr.get(host)).toBe('Привет');
  });

  it('uses the fallback encoding last', () => {
    const attr = stringField('comment');
    const host = new TestHost([['comment', CP1251_HELLO]]);
    host.context = { encoding: null, codepage: null, fallbackEncoding: 'windows-1251' };
    expect(attr.get(host)).toBe('Привет');
  });

  it('only tries its fixed encoding', () => {
    const attr = stringField('encoding', { encoding: 'ascii' });
    const host = new TestHost([['encoding', new Uint8Array([0xe9])]]);
    host.context = { encoding: null, codepage: null, fallbackEncoding: 'windows-1252' };
    expect(() => attr.get(host)).toThrow('encoding: cannot decode bytes 0xe9 as ascii');
  });

  it('rejects blank text', () => {
    const attr = stringField('comment');
    expect(() => attr.set(new TestHost(), '')).toThrow(EmptyValueError);
    expect(() => attr.set(new TestHost(), ' \t\n')).toThrow('comment: empty value is not allowed');
  });

  it('saves text', () => {
    const attr = stringField('comment');
    const host = new TestHost([['comment', CP1251_HELLO]]);
    host.context = { encoding: 'windows-1251', codepage: null, fallbackEncoding: null };
    attr.get(host);
    attr.saveTo(host);
    expect(host.data.get('comment')).toBe('Привет');
  });
});

describe('urlField', () => {
  it('loads UTF-8 URLs', () => {
    const attr = urlField('announce');
    expect(attr.get(new TestHost([['announce', utf8('http://tracker.test/announce')]]))).toBe(
      'http://tracker.test/announce',
    );
  });

  it('rejects ill-formed URLs', () => {
    const attr = urlField('announce');
    const run = () => attr.set(new TestHost(), 'ftp://tracker.test');
    expect(run).toThrow(IllFormedUrlError);
    expect(run).toThrow('announce: the value "ftp://tracker.test" is ill-formed (unexpected scheme)');
  });

  it('checks emptiness before the URL', () => {
    const attr = urlField('announce');
    expect(() => attr.set(new TestHost(), '')).toThrow('announce: empty value is not allowed');
  });

  it('accepts custom schemes', () => {
    const attr = urlField('publisher-url', { schemes: ['ftp'] });
    const host = new TestHost();
    attr.set(host, 'ftp://files.test');
    expect(attr.get(host)).toBe('ftp://files.test');
  });
});

describe('timestampField', () => {
  it('loads dates', () => {
    const attr = timestampField('creation date');
    expect(attr.get(new TestHost([['creation date', 1700000000]]))).toEqual(new Date('2023-11-14T22:13:20Z'));
  });

  it('saves whole seconds', () => {
    const attr = timestampField('creation date');
    const host = new TestHost();
    attr.set(host, new Date(1500));
    attr.saveTo(host);
    expect(host.data.get('creation date')).toBe(1);
  });

  it('rejects invalid dates', () => {
    const attr = timestampField('creation date');
    const run = () => attr.set(new TestHost(), new Date(NaN));
    expect(run).toThrow(ConversionError);
    expect(run).toThrow('creation date: expected a valid date');
  });

  it('rejects out-of-range timestamps', () => {
    const attr = timestampField('creation date');
    expect(() => attr.get(new TestHost([['creation date', 253402300800]]))).toThrow(
      'creation date: timestamp 253402300800 is out of range',
    );
  });

  it('rejects other types', () => {
    const attr = timestampField('creation date');
    expect(() => attr.get(new TestHost([['creation date', utf8('x')]]))).toThrow(
      'creation date: expected bytes "x" to be of type Date',
    );
  });
});

describe('urlListField', () => {
  it('loads a bare URL as a one-item list', () => {
    const attr = urlListField('url-list');
    const list = attr.get(new TestHost([['url-list', utf8('http://seed.test/a')]]));
    expect(list?.toArray()).toEqual(['http://seed.test/a']);
  });

  it('loads a list of URLs', () => {
    const attr = urlListField('url-list');
    const list = attr.get(new TestHost([['url-list', [utf8('http://seed.test/a'), utf8('http://seed.test/b')]]]));
    expect(list?.toArray()).toEqual(['http://seed.test/a', 'http://seed.test/b']);
  });

  it('stores by size', () => {
    const attr = urlListField('url-list');
    const host = new TestHost();

    attr.set(host, []);
    attr.saveTo(host);
    expect(host.data.has('url-list')).toBe(false);

    attr.set(host, 'http://seed.test/a');
    attr.saveTo(host);
    expect(host.data.get('url-list')).toBe('http://seed.test/a');

    attr.set(host, ['http://seed.test/a', 'http://seed.test/b']);
    attr.saveTo(host);
    expect(host.data.get('url-list')).toEqual(['http://seed.test/a', 'http://seed.test/b']);
  });

  it('validates items', () => {
    const attr = urlListField('url-list');
    expect(() => attr.set(new TestHost(), ['seed.test'])).toThrow(
      'url-list: the value "seed.test" is ill-formed (missing scheme)',
    );
  });

  it('adopts a list with the same item validator', () => {
    const source = urlListField('url-list');
    const target = urlListField('httpseeds');
    const first = new TestHost([['url-list', utf8('http://seed.test/a')]]);
    const second = new TestHost();
    const list = source.get(first);
    target.set(second, list);
    expect(target.get(second)).toBe(list);
  });
});

describe('nodeListField', () => {
  it('loads [host, port] pairs', () => {
    const attr = nodeListField('nodes');
    const list = attr.get(new TestHost([['nodes', [[utf8('router.test'), 6881]]]]));
    expect(list?.toArray()).toEqual(['router.test:6881']);
  });

  it('saves [host, port] pairs', () => {
    const attr = nodeListField('nodes');
    const host = new TestHost();
    attr.set(host, ['router.test:6881', '10.0.0.1:80']);
    attr.saveTo(host);
    expect(host.data.get('nodes')).toEqual([
      ['router.test', 6881],
      ['10.0.0.1', 80],
    ]);
  });

  it('rejects a bare stored value', () => {
    const attr = nodeListField('nodes');
    expect(() => attr.get(new TestHost([['nodes', utf8('x')]]))).toThrow(
      'nodes: expected bytes "x" to be of type string',
    );
  });
});

describe('announceListField', () => {
  it('loads tiers', () => {
    const attr = announceListField('announce-list');
    const list = attr.get(
      new TestHost([['announce-list', [[utf8('http://a.test/announce')], [utf8('udp://b.test:80')]]]]),
    );
    expect(list?.toArray()).toEqual([['http://a.test/announce'], ['udp://b.test:80']]);
  });

  it('saves tiers', () => {
    const attr = announceListField('announce-list');
    const host = new TestHost();
    attr.set(host, [['http://a.test/announce', 'http://c.test/announce']]);
    attr.saveTo(host);
    expect(host.data.get('announce-list')).toEqual([['http://a.test/announce', 'http://c.test/announce']]);
  });

  it('rejects empty tiers', () => {
    const attr = announceListField('announce-list');
    expect(() => attr.set(new TestHost(), [[]])).toThrow('announce-list: empty value is not allowed');
  });
});

describe('dictField', () => {
  it('accepts plain objects', () => {
    const attr = dictField('info');
    const host = new TestHost();
    attr.set(host, { name: 'file', length: 1 });
    expect(attr.get(host)).toEqual(
      new Map<string, string | number>([
        ['name', 'file'],
        ['length', 1],
      ]),
    );
  });

  it('rejects other types', () => {
    const attr = dictField('info');
    expect(() => attr.set(new TestHost(), 'x')).toThrow('info: expected "x" to be of type dict');
  });
});
