import { describe, test, expect } from '@jest/globals';
import { ParseError, ValidationError } from '../../errors.js';
import { createHttpStub, networkError, StubHandler } from '../../testHelpers.js';
import { ParserApiAdapter } from './ParserApiAdapter.js';

const CONFIG = {
  apiUrl: 'https://parser.test/api/hybrid/video_data',
  allowedHosts: ['v.douyin.com'],
  timeoutMs: 1000
};

const SHARE_URL = 'https://v.douyin.com/abc123/';

function videoPayload() {
  return {
    aweme_id: '7300000000000000001',
    desc: 'Cooking noodles',
    author: { nickname: 'chef' },
    video: {
      play_addr: { url_list: ['https://cdn.test/play.mp4'] },
      bit_rate: [
        { bit_rate: 1200000, gear_name: 'normal_720', play_addr: { url_list: ['https://cdn.test/720.mp4'] } },
        { bit_rate: 2400000, gear_name: 'normal_1080', play_addr: { url_list: ['https://cdn.test/1080.mp4'] } }
      ]
    }
  };
}

function adapterReplying(handler: StubHandler) {
  const { http, requests } = createHttpStub(handler);
  return { adapter: new ParserApiAdapter(http, CONFIG), requests };
}

describe('ParserApiAdapter', () => {
  test('resolves a video with all of its bit rate variants', async () => {
    const { adapter, requests } = adapterReplying(() => ({
      status: 200,
      data: { code: 200, msg: 'success', data: videoPayload() }
    }));

    const media = await adapter.resolve(`look at this ${SHARE_URL} wow`);

    expect(media).toEqual({
      contentId: '7300000000000000001',
      description: 'Cooking noodles',
      author: 'chef',
      mediaType: 'video',
      assets: [
        { url: 'https://cdn.test/720.mp4', kind: 'video', bitRate: 1200000, label: 'normal_720' },
        { url: 'https://cdn.test/1080.mp4', kind: 'video', bitRate: 2400000, label: 'normal_1080' }
      ]
    });
    expect(requests).toHaveLength(1);
    expect(requests[0].url).toBe(CONFIG.apiUrl);
    expect(requests[0].params).toEqual({ url: SHARE_URL, minimal: 'false' });
    expect(requests[0].timeout).toBe(1000);
  });

  test('falls back to the plain play address and numeric ids', async () => {
    const { adapter } = adapterReplying(() => ({
      status: 200,
      data: {
        code: 200,
        data: { aweme_id: 42, video: { play_addr: { url_list: ['https://cdn.test/play.mp4'] } } }
      }
    }));

    const media = await adapter.resolve(SHARE_URL);

    expect(media).toEqual({
      contentId: '42',
      description: '',
      author: '',
      mediaType: 'video',
      assets: [{ url: 'https://cdn.test/play.mp4', kind: 'video' }]
    });
  });

  test('classifies image posts with motion clips as live photos', async () => {
    const { adapter } = adapterReplying(() => ({
      status: 200,
      data: {
        code: 200,
        data: {
          aweme_id: '7300000000000000002',
          desc: 'Beach day',
          author: { nickname: 'traveller' },
          images: [
            { url_list: ['https://cdn.test/1.jpeg'], video: { play_addr: { url_list: ['https://cdn.test/1.mp4'] } } },
            { url_list: ['https://cdn.test/2.jpeg'] }
          ]
        }
      }
    }));

    const media = await adapter.resolve(SHARE_URL);

    expect(media.mediaType).toBe('live_photo');
    expect(media.assets).toEqual([
      { url: 'https://cdn.test/1.jpeg', kind: 'image', label: 'image_1' },
      { url: 'https://cdn.test/1.mp4', kind: 'video', label: 'live_1' },
      { url: 'https://cdn.test/2.jpeg', kind: 'image', label: 'image_2' }
    ]);
  });

  test('classifies plain image posts as images', async () => {
    const { adapter } = adapterReplying(() => ({
      status: 200,
      data: {
        code: 200,
        data: { aweme_id: '7', images: [{ url_list: ['https://cdn.test/1.jpeg'] }] }
      }
    }));

    const media = await adapter.resolve(SHARE_URL);

    expect(media.mediaType).toBe('image');
    expect(media.assets).toEqual([{ url: 'https://cdn.test/1.jpeg', kind: 'image', label: 'image_1' }]);
  });

  test('surfaces upstream rejections as retryable parse errors', async () => {
    const { adapter } = adapterReplying(() => ({
      status: 200,
      data: { code: 400, msg: 'invalid share link', data: null }
    }));

    await expect(adapter.resolve(SHARE_URL)).rejects.toMatchObject({
      name: 'ParseError',
      message: 'parser rejected link (code 400): invalid share link',
      retryable: true
    });
  });

  test('reports missing fields as a terminal schema mismatch', async () => {
    const payload: Record<string, unknown> = videoPayload();
    delete payload.aweme_id;
    const { adapter } = adapterReplying(() => ({ status: 200, data: { code: 200, data: payload } }));

    await expect(adapter.resolve(SHARE_URL)).rejects.toMatchObject({
      message: 'parser response schema mismatch at aweme_id',
      retryable: false
    });
  });

  test('rejects numeric ids too large to survive JSON parsing', async () => {
    const payload = { ...videoPayload(), aweme_id: 7300000000000000001 };
    const { adapter } = adapterReplying(() => ({ status: 200, data: { code: 200, data: payload } }));

    await expect(adapter.resolve(SHARE_URL)).rejects.toMatchObject({
      message: 'parser response schema mismatch at aweme_id',
      retryable: false
    });
  });

  test('reports a body without an envelope as a schema mismatch', async () => {
    const { adapter } = adapterReplying(() => ({ status: 200, data: '<html>maintenance</html>' }));

    await expect(adapter.resolve(SHARE_URL)).rejects.toMatchObject({
      message: 'parser response schema mismatch: invalid envelope',
      retryable: false
    });
  });

  test('reports a post without any media', async () => {
    const { adapter } = adapterReplying(() => ({
      status: 200,
      data: { code: 200, data: { aweme_id: '7', desc: 'text only' } }
    }));

    await expect(adapter.resolve(SHARE_URL)).rejects.toThrow(
      new ParseError('parser response schema mismatch: no downloadable media')
    );
  });

  test.each([
    [503, true],
    [429, true],
    [404, false]
  ])('classifies HTTP %i as retryable=%s', async (status, retryable) => {
    const { adapter } = adapterReplying(() => ({ status, data: {} }));

    await expect(adapter.resolve(SHARE_URL)).rejects.toMatchObject({
      message: `parser API responded with HTTP ${status}`,
      retryable
    });
  });

  test('treats connection failures as retryable', async () => {
    const { adapter } = adapterReplying(() => {
      throw networkError('ECONNREFUSED');
    });

    await expect(adapter.resolve(SHARE_URL)).rejects.toMatchObject({
      message: 'parser API unreachable: network error (ECONNREFUSED)',
      retryable: true
    });
  });

  test('validates the link before calling out', async () => {
    const { adapter, requests } = adapterReplying(() => ({ status: 200, data: {} }));

    await expect(adapter.resolve('https://example.com/video/1')).rejects.toThrow(ValidationError);
    expect(requests).toHaveLength(0);
  });

  test('fails when no parser endpoint is configured', async () => {
    const { http, requests } = createHttpStub(() => ({ status: 200, data: {} }));
    const adapter = new ParserApiAdapter(http, { ...CONFIG, apiUrl: '' });

    await expect(adapter.resolve(SHARE_URL)).rejects.toThrow('parser endpoint is not configured');
    expect(requests).toHaveLength(0);
  });
});
