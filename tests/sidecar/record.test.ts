import { emptyAiDetails, toAiDetails, toJsonObject, toSidecarRecord } from '../../src/sidecar/record.js';

describe('sidecar record projection', () => {
  it('fills required fields and keeps unknown keys', () => {
    const record = toSidecarRecord({ title: 'x', extra_key: 'kept', tags: 'a,b' });
    expect(record).toEqual({
      title: 'x',
      description: '',
      reviewed: false,
      ai_generated: false,
      ai_details: emptyAiDetails(),
      detected_at: 0,
      extra_key: 'kept',
      tags: ['a', 'b'],
    });
  });

  it('only sets extended fields that are present', () => {
    const record = toSidecarRecord({ caption: 'c' });
    expect(record.caption).toBe('c');
    expect('author' in record).toBe(false);
    expect('tags' in record).toBe(false);
  });

  it('blanks an unknown enrichment status', () => {
    expect(toAiDetails({ status: 'weird', model: 'm' })).toEqual({ ...emptyAiDetails(), model: 'm' });
    expect(toAiDetails({ status: 'error_http', http_status: 503 })).toMatchObject({ status: 'error_http', http_status: 503 });
  });

  it('toJsonObject drops undefined members', () => {
    expect(toJsonObject({ a: 1, b: undefined })).toEqual({ a: 1 });
  });
});
