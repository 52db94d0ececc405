import { describe, it, expect } from 'vitest';
import { acceptsUploadsFrom, toInboundMessageRefs } from '../events/messageCreate.js';
import { nextPage } from '../commands/leaderboard.js';

describe('upload listener', () => {
  it('yields one ref per attachment', () => {
    const refs = toInboundMessageRefs({
      channelId: '10',
      id: '20',
      attachments: new Map([
        ['30', { id: '30' }],
        ['31', { id: '31' }],
      ]),
    });

    expect(refs).toEqual([
      { chatId: '10', messageId: '20', documentFileId: '30' },
      { chatId: '10', messageId: '20', documentFileId: '31' },
    ]);
  });

  it('yields a ref without a document for a plain message', () => {
    expect(toInboundMessageRefs({ channelId: '10', id: '20', attachments: new Map() })).toEqual([
      { chatId: '10', messageId: '20', documentFileId: null },
    ]);
  });

  it('answers in DMs and in the backup channel only', () => {
    expect(acceptsUploadsFrom('10', true, null)).toBe(true);
    expect(acceptsUploadsFrom('10', false, '10')).toBe(true);
    expect(acceptsUploadsFrom('10', false, '11')).toBe(false);
    expect(acceptsUploadsFrom('10', false, null)).toBe(false);
  });
});

describe('leaderboard paging', () => {
  it('moves between pages and stops at the edges', () => {
    expect(nextPage('next', 0, 3)).toBe(1);
    expect(nextPage('next', 2, 3)).toBe(2);
    expect(nextPage('prev', 0, 3)).toBe(0);
    expect(nextPage('last', 0, 3)).toBe(2);
    expect(nextPage('first', 2, 3)).toBe(0);
    expect(nextPage('unknown', 1, 3)).toBe(1);
  });
});
