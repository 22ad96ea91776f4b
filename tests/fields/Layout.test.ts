import { Layout } from '../../src/fields/Layout';
import { integerField, stringField } from '../../src/fields/fields';
import type { FieldHost, TextContext } from '../../src/fields/Attr';
import type { BencodeInteger, BencodeKey, Encodable } from '../../src/BencodeValue';
import { CP1251_HELLO, utf8 } from './TestHost';

interface NoteFields {
  comment: string;
  encoding: string;
  size: BencodeInteger;
}

function noteLayout(): Layout<NoteFields> {
  const encoding = stringField('encoding', { encoding: 'ascii' });
  return new Layout<NoteFields>(
    { comment: stringField('comment'), encoding, size: integerField('size', { min: 0 }) },
    { encoding },
  );
}

class Note implements FieldHost {
  readonly data: Map<BencodeKey, Encodable>;

  constructor(
    readonly layout: Layout<NoteFields>,
    entries: Iterable<readonly [BencodeKey, Encodable]>,
  ) {
    this.data = new Map(entries);
  }

  textContext(): TextContext {
    return this.layout.textContext(this, null);
  }
}

describe('Layout', () => {
  it('binds fields to their accessor names', () => {
    const layout = new Layout<{ itemCount: BencodeInteger }>({ itemCount: integerField('count') });
    expect(layout.fields.itemCount.name).toBe('itemCount');
    expect(layout.all.map(attr => attr.key)).toEqual(['count']);
  });

  it('requires context fields to be declared', () => {
    const encoding = stringField('encoding');
    expect(() => new Layout<{ size: BencodeInteger }>({ size: integerField('size') }, { encoding })).toThrow(
      'context field encoding is not part of the layout',
    );
  });

  it('rejects a context encoding that depends on itself', () => {
    const encoding = stringField('encoding');
    const layout = new Layout<{ encoding: string }>({ encoding }, { encoding });
    const host: FieldHost = {
      data: new Map<BencodeKey, Encodable>([['encoding', utf8('utf-8')]]),
      textContext: () => layout.textContext(host, null),
    };
    expect(() => layout.loadAll(host)).toThrow('field encoding is read while it is being loaded');
    expect(host.data.has('encoding')).toBe(true);
    expect(encoding.isLoaded(host)).toBe(false);
  });

  it('loads the context before other fields', () => {
    const note = new Note(noteLayout(), [
      ['comment', CP1251_HELLO],
      ['encoding', utf8('windows-1251')],
      ['size', 3],
    ]);
    note.layout.loadAll(note);
    expect(note.layout.fields.comment.get(note)).toBe('Привет');
    expect(note.layout.fields.encoding.get(note)).toBe('windows-1251');
    expect(note.data.size).toBe(0);
  });

  it('does not reload fields', () => {
    const note = new Note(noteLayout(), [
      ['comment', CP1251_HELLO],
      ['encoding', utf8('windows-1251')],
    ]);
    expect(note.layout.fields.comment.get(note)).toBe('Привет');
    note.layout.loadAll(note);
    expect(note.layout.fields.encoding.get(note)).toBe('windows-1251');
  });

  it('saves every loaded field', () => {
    const note = new Note(noteLayout(), [
      ['encoding', utf8('windows-1251')],
      ['size', 3],
      ['extra', 1],
    ]);
    note.layout.loadAll(note);
    note.layout.fields.size.set(note, 4);
    note.layout.saveAll(note);
    expect(note.data).toEqual(
      new Map<string, string | number>([
        ['extra', 1],
        ['encoding', 'windows-1251'],
        ['size', 4],
      ]),
    );
  });
});
