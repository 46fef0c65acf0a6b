import { describe, expect, it } from 'vitest';
import { NURSING_TAGS, PREGNANT_TAGS, extractSectionText } from './sectionLocator.js';
import { element, lang, pi } from '../../test-utils/documentNodes.js';

describe('extractSectionText', () => {
  it('joins Japanese texts before other languages and reports the first id', () => {
    const root = pi('PackInsDocument', {}, [
      pi('UseInPregnant', { attrs: { id: 'preg-1' } }, [
        pi('Detail', {}, [lang('en', 'Do not administer.'), lang('ja', '投与しないこと。')]),
      ]),
      element('urn:older-schema', 'Pregnant', { attrs: { id: 'preg-2' } }, [
        lang('ja', '投与しないこと。'),
        lang('ja-JP', '動物実験で催奇形性が報告されている。'),
      ]),
    ]);

    expect(extractSectionText(root, PREGNANT_TAGS)).toEqual({
      text: '投与しないこと。\n\n動物実験で催奇形性が報告されている。\n\nDo not administer.',
      sourceId: 'preg-1',
    });
  });

  it('normalizes each language text', () => {
    const root = pi('Doc', {}, [
      pi('UseInNursing', {}, [lang('ja', '  授乳を\r\n\r\n\r\n中止させること。 ')]),
    ]);
    expect(extractSectionText(root, NURSING_TAGS)).toEqual({ text: '授乳を\n\n中止させること。', sourceId: undefined });
  });

  it('falls back to the text of the first hit without language variants', () => {
    const root = pi('Doc', {}, [
      pi('BreastFeeding', { attrs: { id: 'bf' }, text: '  授乳\u3000中の女性  ' }, [
        pi('Item', { text: '注意', tail: '\r\n\r\n\r\n' }),
      ]),
      pi('Nursing', { text: '二つ目' }),
    ]);
    expect(extractSectionText(root, NURSING_TAGS)).toEqual({ text: '授乳 中の女性 注意', sourceId: 'bf' });
  });

  it('returns nothing when no section is present', () => {
    expect(extractSectionText(pi('Doc'), PREGNANT_TAGS)).toEqual({});
    expect(extractSectionText(undefined, PREGNANT_TAGS)).toEqual({});
  });

  it('reports the id even when the section has no text', () => {
    const root = pi('Doc', {}, [pi('UseInPregnantWomen', { attrs: { id: 'p0' } })]);
    expect(extractSectionText(root, PREGNANT_TAGS)).toEqual({ text: undefined, sourceId: 'p0' });
  });
});
