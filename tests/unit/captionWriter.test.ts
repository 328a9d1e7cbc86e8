import { describe, it, expect, vi, beforeEach } from 'vitest';
import {
  ClaudeCaptionWriter,
  TemplateCaptionWriter,
  buildCaptionPrompt,
  formatCaption,
  parseCaption,
  validateCaption,
  DEFAULT_CAPTION_RULES,
} from '../../src/modules/publisher/index.js';
import { TimeoutError } from '../../src/modules/errors/index.js';
import { makeItem } from '../helpers/memoryStore.js';

const GOOD_RESPONSE = [
  'Body:',
  'PR This desk lamp makes late nights easy.',
  'Check it out on TikTok Shop!',
  '',
  'Hashtags:',
  '#desklamp #homeoffice #desklamp #cozy #lighting #TikTokShop',
].join('\n');

describe('formatCaption', () => {
  it('joins body and hashtags with a blank line', () => {
    expect(formatCaption('PR Lamp', ['#a', '#b']).fullText).toBe('PR Lamp\n\n#a #b');
  });

  it('uses the body alone when there are no hashtags', () => {
    expect(formatCaption('PR Lamp', []).fullText).toBe('PR Lamp');
  });
});

describe('parseCaption', () => {
  it('extracts the body and de-duplicated hashtags', () => {
    const caption = parseCaption(GOOD_RESPONSE);

    expect(caption.body).toBe('PR This desk lamp makes late nights easy.\nCheck it out on TikTok Shop!');
    expect(caption.hashtags).toEqual(['#desklamp', '#homeoffice', '#cozy', '#lighting', '#TikTokShop']);
  });

  it('caps the number of hashtags', () => {
    const caption = parseCaption('Body:\nPR Lamp\nHashtags: #a #b #c #d', 2);

    expect(caption.hashtags).toEqual(['#a', '#b']);
  });

  it('returns an empty body when the section is missing', () => {
    expect(parseCaption('#a #b').body).toBe('');
  });
});

describe('validateCaption', () => {
  it('accepts a caption that follows every rule', () => {
    expect(validateCaption(parseCaption(GOOD_RESPONSE))).toEqual([]);
  });

  it('lists every broken rule', () => {
    expect(validateCaption(formatCaption('Great lamp', ['#a', '#b', '#c']))).toEqual([
      'body must start with "PR"',
      '3 hashtags (expected 5-7)',
    ]);
  });

  it('flags an overlong body', () => {
    const body = `PR ${'x'.repeat(300)}`;

    expect(validateCaption(formatCaption(body, ['#a', '#b', '#c', '#d', '#e']))).toEqual([
      'body is 303 characters (max 300)',
    ]);
  });
});

describe('TemplateCaptionWriter', () => {
  it('builds a disclosed caption with a category hashtag first', async () => {
    const caption = await new TemplateCaptionWriter().write(
      makeItem({ itemId: 'x1', name: 'Desk Lamp', price: 1980, category: 'Home Decor', description: 'Warm light' })
    );

    expect(caption.body).toBe('PR Desk Lamp\nPrice: 1,980\nWarm light\nCheck it out on TikTok Shop!');
    expect(caption.hashtags).toEqual([
      '#HomeDecor',
      '#TikTokShop',
      '#TikTokMadeMeBuyIt',
      '#musthave',
      '#deals',
      '#shopping',
    ]);
    expect(validateCaption(caption)).toEqual([]);
  });

  it('does not repeat a category hashtag that is already present', async () => {
    const caption = await new TemplateCaptionWriter().write(makeItem({ itemId: 'x1', category: 'deals' }));

    expect(caption.hashtags).toHaveLength(5);
  });

  it('truncates a long body to the limit', async () => {
    const caption = await new TemplateCaptionWriter().write(
      makeItem({ itemId: 'x1', name: 'Lamp', description: 'a'.repeat(400) })
    );

    expect(caption.body).toHaveLength(300);
    expect(caption.body.endsWith('…')).toBe(true);
  });
});

describe('buildCaptionPrompt', () => {
  it('includes the product details and the disclosure rule', () => {
    const prompt = buildCaptionPrompt(makeItem({ itemId: 'x1', name: 'Desk Lamp', price: 1980 }), DEFAULT_CAPTION_RULES);

    expect(prompt).toContain('Name: Desk Lamp');
    expect(prompt).toContain('Price: 1980');
    expect(prompt).toContain('Start the body with "PR"');
  });
});

describe('ClaudeCaptionWriter', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  const item = makeItem({ itemId: 'x1', name: 'Desk Lamp' });

  it('uses the model output when it passes validation', async () => {
    const complete = vi.fn(async (_prompt: string) => GOOD_RESPONSE);

    const caption = await new ClaudeCaptionWriter({}, { complete }).write(item);

    expect(caption.fullText).toBe(
      'PR This desk lamp makes late nights easy.\nCheck it out on TikTok Shop!\n\n' +
        '#desklamp #homeoffice #cozy #lighting #TikTokShop'
    );
    expect(complete).toHaveBeenCalledTimes(1);
  });

  it('regenerates after an unusable response', async () => {
    const complete = vi
      .fn(async (_prompt: string) => GOOD_RESPONSE)
      .mockRejectedValueOnce(new Error('overloaded'))
      .mockResolvedValueOnce('Body:\nNo disclosure here\nHashtags: #a');

    await new ClaudeCaptionWriter({}, { complete }).write(item);

    expect(complete).toHaveBeenCalledTimes(3);
  });

  it('falls back to the template when every attempt fails', async () => {
    const complete = vi.fn(async (_prompt: string) => 'not a caption');

    const caption = await new ClaudeCaptionWriter({ maxRetries: 1 }, { complete }).write(item);

    expect(complete).toHaveBeenCalledTimes(2);
    expect(caption.body).toBe('PR Desk Lamp\nCheck it out on TikTok Shop!');
  });

  it('passes the run signal on and gives up without a template caption once it aborts', async () => {
    const controller = new AbortController();
    const complete = vi.fn(async (_prompt: string, _signal?: AbortSignal): Promise<string> => {
      controller.abort(new TimeoutError('Run exceeded its budget'));
      throw new TimeoutError('Run exceeded its budget');
    });

    await expect(new ClaudeCaptionWriter({}, { complete }).write(item, controller.signal)).rejects.toThrow(
      'Run exceeded its budget'
    );
    expect(complete).toHaveBeenCalledTimes(1);
    expect(complete).toHaveBeenCalledWith(buildCaptionPrompt(item, DEFAULT_CAPTION_RULES), controller.signal);
  });

  it('uses the template when no API key is configured', async () => {
    const caption = await new ClaudeCaptionWriter().write(item);

    expect(caption.hashtags[0]).toBe('#TikTokShop');
  });
});
