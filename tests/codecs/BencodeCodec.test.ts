import { ByteReader } from '../../src/ByteReader';
import { BencodeCodec } from '../../src/codecs/BencodeCodec';
import { EncodeError } from '../../src/errors';
import { asciiBytes, asciiText } from '../../src/helpers';

describe('BencodeCodec', () => {
  const codec = new BencodeCodec();

  describe('classify', () => {
    it('maps text to UTF-8 bytes', () => {
      expect(BencodeCodec.classify('é')).toEqual({ kind: 'bytes', value: new Uint8Array([0xc3, 0xa9]) });
    });

    it('maps booleans to 0 and 1', () => {
      expect(BencodeCodec.classify(false)).toEqual({ kind: 'integer', value: 0 });
      expect(BencodeCodec.classify(true)).toEqual({ kind: 'integer', value: 1 });
    });

    it('maps maps and plain objects to dictionaries', () => {
      expect(BencodeCodec.classify(new Map()).kind).toBe('dict');
      expect(BencodeCodec.classify({}).kind).toBe('dict');
      expect(BencodeCodec.classify(Object.create(null)).kind).toBe('dict');
    });

    it.each([
      [null, 'null'],
      [undefined, 'undefined'],
      [1.5, 'number'],
      [NaN, 'number'],
      [new Date(0), 'Date'],
      [new Set(), 'Set'],
      [() => 0, 'function'],
    ])('rejects %p', (value, name) => {
      expect(() => BencodeCodec.classify(value)).toThrow(EncodeError);
      expect(() => BencodeCodec.classify(value)).toThrow(`object of type ${name} cannot be encoded`);
    });
  });

  describe('decode', () => {
    it('dispatches on the type selector', () => {
      const decodeOne = (input: string) => codec.decode(ByteReader.from(asciiBytes(input)));
      expect(decodeOne('0:')).toEqual(new Uint8Array(0));
      expect(decodeOne('9:123456789')).toEqual(asciiBytes('123456789'));
      expect(decodeOne('i1e')).toBe(1);
      expect(decodeOne('le')).toEqual([]);
      expect(decodeOne('de')).toEqual(new Map());
    });

    it('reports unknown selectors in upper-case hex', () => {
      expect(() => codec.decode(ByteReader.from(asciiBytes('x')))).toThrow('unknown type selector 0x78');
      expect(() => codec.decode(ByteReader.from(new Uint8Array([0xab])))).toThrow('unknown type selector 0xAB');
    });
  });

  describe('iterencode', () => {
    it('yields nested chunks in order', () => {
      const chunks = [...codec.iterencode({ a: [1, 'x'] })].map(asciiText);
      expect(chunks).toEqual(['d', '1', ':', 'a', 'l', 'i', '1', 'e', '1', ':', 'x', 'e', 'e']);
    });
  });
});
