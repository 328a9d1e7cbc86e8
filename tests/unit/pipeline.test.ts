import { describe, it, expect, vi, beforeEach } from 'vitest';
import { PublishPipeline, needsReconciliation, type PipelineDependencies } from '../../src/modules/publisher/pipeline.js';
import type { PipelineConfig } from '../../src/modules/publisher/types.js';
import { CredentialError, HostingError, RemoteError, TimeoutError } from '../../src/modules/errors/index.js';
import { sleep } from '../../src/modules/retry/index.js';
import { MemoryCatalogStore, makeAttempt, makeItem } from '../helpers/memoryStore.js';
import {
  FIXED_NOW,
  FixedCaptionWriter,
  fakeCredentials,
  fakeMediaHost,
  fakePublisher,
  fixedClock,
  noSleep,
} from '../helpers/fakes.js';

const CONFIG: Partial<PipelineConfig> = {
  hosting: { maxAttempts: 3, baseDelayMs: 10, maxDelayMs: 100 },
  publishInit: { maxAttempts: 3, baseDelayMs: 10, maxDelayMs: 100 },
  confirmation: { maxPolls: 3, pollIntervalMs: 10, maxDelayMs: 100 },
  reconcileWindowMs: 60 * 60 * 1000,
};

const MINUTE = 60 * 1000;
const HOUR = 60 * MINUTE;

describe('PublishPipeline', () => {
  let store: MemoryCatalogStore;
  let mediaHost: ReturnType<typeof fakeMediaHost>;
  let publisher: ReturnType<typeof fakePublisher>;
  let credentials: ReturnType<typeof fakeCredentials>;
  let ids: number;

  function createPipeline(
    overrides: Partial<PipelineDependencies> = {},
    options: { sleep?: typeof sleep; clock?: () => Date } = {}
  ) {
    return new PublishPipeline(
      { store, mediaHost, publisher, credentials, captions: new FixedCaptionWriter(), ...overrides },
      CONFIG,
      { clock: options.clock ?? fixedClock(), sleep: options.sleep ?? noSleep, newId: () => `attempt-${++ids}` }
    );
  }

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});

    store = new MemoryCatalogStore([makeItem({ itemId: 'x1' }), makeItem({ itemId: 'x2', postCount: 3 })]);
    mediaHost = fakeMediaHost();
    publisher = fakePublisher();
    credentials = fakeCredentials();
    ids = 0;
  });

  async function item(itemId = 'x1') {
    const found = await store.getItem(itemId);
    if (!found) throw new Error(`missing ${itemId}`);
    return found;
  }

  describe('successful publish', () => {
    it('records a published attempt and updates rotation stats', async () => {
      const outcome = await createPipeline().execute(await item(), { runId: 'run-1' });

      expect(outcome.kind).toBe('recorded');
      expect(store.attempts).toHaveLength(1);
      expect(store.attempts[0]).toMatchObject({
        id: 'attempt-1',
        itemId: 'x1',
        runId: 'run-1',
        status: 'published',
        failureReason: null,
        publishId: 'pub-1',
        hostedMediaUrl: 'https://i.ibb.co/x1.jpg',
        postText: 'PR Item x1\n\n#a #b #c #d #e',
        reconciled: false,
        publishInitiatedAt: FIXED_NOW,
        completedAt: FIXED_NOW,
      });

      expect(store.items.get('x1')).toMatchObject({ postCount: 1, lastPostedAt: FIXED_NOW });
      expect(store.items.get('x2')).toMatchObject({ postCount: 3, lastPostedAt: null });
    });

    it('passes the caption, hosted URL, privacy level and access token to the publisher', async () => {
      await createPipeline().execute(await item());

      expect(mediaHost.host).toHaveBeenCalledWith('https://img.example.com/x1.jpg', undefined);
      expect(publisher.initPublish).toHaveBeenCalledWith(
        'PR Item x1\n\n#a #b #c #d #e',
        'https://i.ibb.co/x1.jpg',
        { privacyLevel: 'SELF_ONLY' },
        'access-1',
        undefined
      );
      expect(publisher.confirmStatus).toHaveBeenCalledWith('pub-1', 'access-1', undefined);
    });
  });

  describe('media hosting', () => {
    it('fails with media_unavailable when the item has no media reference', async () => {
      store.items.set('x1', makeItem({ itemId: 'x1', mediaUrl: null }));

      await createPipeline().execute(await item());

      expect(mediaHost.host).not.toHaveBeenCalled();
      expect(publisher.initPublish).not.toHaveBeenCalled();
      expect(store.attempts[0]).toMatchObject({ status: 'failed', failureReason: 'media_unavailable' });
      expect(store.items.get('x1')?.postCount).toBe(0);
    });

    it('retries transient hosting failures up to the attempt cap', async () => {
      mediaHost.host.mockRejectedValue(new HostingError('upstream 502', true));

      await createPipeline().execute(await item());

      expect(mediaHost.host).toHaveBeenCalledTimes(3);
      expect(store.attempts[0]).toMatchObject({
        status: 'failed',
        failureReason: 'media_unavailable',
        errorMessage: 'upstream 502',
      });
    });

    it('does not retry a permanent hosting failure', async () => {
      mediaHost.host.mockRejectedValue(new HostingError('image too large', false));

      await createPipeline().execute(await item());

      expect(mediaHost.host).toHaveBeenCalledTimes(1);
      expect(store.attempts[0].failureReason).toBe('media_unavailable');
    });
  });

  describe('publish init', () => {
    it('recovers from a transient init failure', async () => {
      publisher.initPublish.mockRejectedValueOnce(new RemoteError('HTTP 503', true));

      await createPipeline().execute(await item());

      expect(publisher.initPublish).toHaveBeenCalledTimes(2);
      expect(store.attempts[0]).toMatchObject({ status: 'published', publishId: 'pub-1' });
    });

    it('fails with publish_init_failed after a rejected init', async () => {
      publisher.initPublish.mockRejectedValue(new RemoteError('spam_risk_too_many_posts', false));

      await createPipeline().execute(await item());

      expect(publisher.initPublish).toHaveBeenCalledTimes(1);
      expect(publisher.confirmStatus).not.toHaveBeenCalled();
      expect(store.attempts[0]).toMatchObject({
        status: 'failed',
        failureReason: 'publish_init_failed',
        publishId: null,
        hostedMediaUrl: 'https://i.ibb.co/x1.jpg',
      });
    });
  });

  describe('confirmation', () => {
    it('fails with remote_rejected when the remote reports a terminal failure', async () => {
      publisher.confirmStatus.mockResolvedValue({ status: 'rejected', detail: 'picture_size_check_failed' });

      await createPipeline().execute(await item());

      expect(store.attempts[0]).toMatchObject({
        status: 'failed',
        failureReason: 'remote_rejected',
        publishId: 'pub-1',
        errorMessage: 'Remote rejected publish pub-1: picture_size_check_failed',
      });
      expect(store.items.get('x1')).toMatchObject({ postCount: 0, lastPostedAt: null });
    });

    it('fails with confirmation_timeout when the poll budget runs out', async () => {
      publisher.confirmStatus.mockResolvedValue({ status: 'processing' });

      await createPipeline().execute(await item());

      expect(publisher.confirmStatus).toHaveBeenCalledTimes(3);
      expect(store.attempts[0]).toMatchObject({
        status: 'failed',
        failureReason: 'confirmation_timeout',
        publishId: 'pub-1',
        errorMessage: 'Publish pub-1 still processing after 3 status checks',
      });
      expect(store.items.get('x1')).toMatchObject({ postCount: 0, lastPostedAt: null });
    });

    it('counts a failed status poll and keeps polling', async () => {
      publisher.confirmStatus
        .mockRejectedValueOnce(new RemoteError('HTTP 500', true))
        .mockResolvedValueOnce({ status: 'published' });

      await createPipeline().execute(await item());

      expect(publisher.confirmStatus).toHaveBeenCalledTimes(2);
      expect(store.attempts[0].status).toBe('published');
    });

    it('backs off between polls', async () => {
      publisher.confirmStatus
        .mockResolvedValueOnce({ status: 'processing' })
        .mockResolvedValueOnce({ status: 'processing' })
        .mockResolvedValueOnce({ status: 'published' });
      const recordSleep = vi.fn(async (_ms: number) => {});

      await createPipeline({}, { sleep: recordSleep }).execute(await item());

      expect(recordSleep.mock.calls.map(([ms]) => ms)).toEqual([10, 20]);
    });
  });

  describe('unclassified and run-level failures', () => {
    it('maps an unknown error to unexpected_error', async () => {
      publisher.confirmStatus.mockRejectedValue(new Error('socket hang up'));

      await createPipeline().execute(await item());

      expect(store.attempts[0]).toMatchObject({
        status: 'failed',
        failureReason: 'unexpected_error',
        errorMessage: 'socket hang up',
      });
    });

    it('records credential_error when the token becomes unusable mid-run', async () => {
      credentials.ensureValid.mockRejectedValue(new CredentialError('Token refresh failed'));

      await createPipeline().execute(await item());

      expect(publisher.initPublish).not.toHaveBeenCalled();
      expect(store.attempts[0]).toMatchObject({ status: 'failed', failureReason: 'credential_error' });
      expect(store.items.get('x1')?.postCount).toBe(0);
    });

    it('finalizes as timeout when the run budget is exceeded mid-stage', async () => {
      const controller = new AbortController();
      publisher.confirmStatus.mockImplementation(async () => {
        controller.abort(new TimeoutError('Run exceeded its budget'));
        return { status: 'processing' };
      });

      await createPipeline({}, { sleep }).execute(await item(), { signal: controller.signal });

      expect(store.attempts).toHaveLength(1);
      expect(store.attempts[0]).toMatchObject({
        status: 'failed',
        failureReason: 'timeout',
        publishId: 'pub-1',
        errorMessage: 'Run exceeded its budget',
      });
    });

    it('finalizes as timeout when caption writing outlives the run budget', async () => {
      const controller = new AbortController();
      const captions = {
        write: vi.fn(async (_item: unknown, _signal?: AbortSignal) => {
          controller.abort(new TimeoutError('Run exceeded its budget'));
          return new Promise<never>(() => {});
        }),
      };

      await createPipeline({ captions }).execute(await item(), { signal: controller.signal });

      expect(captions.write).toHaveBeenCalledWith(expect.objectContaining({ itemId: 'x1' }), controller.signal);
      expect(mediaHost.host).not.toHaveBeenCalled();
      expect(store.attempts[0]).toMatchObject({
        status: 'failed',
        failureReason: 'timeout',
        errorMessage: 'Run exceeded its budget',
      });
    });
  });

  describe('dry run', () => {
    it('writes the caption but makes no remote calls and no store writes', async () => {
      const outcome = await createPipeline().execute(await item(), { dryRun: true });

      expect(outcome).toEqual({
        kind: 'dry_run',
        preview: {
          itemId: 'x1',
          text: 'PR Item x1\n\n#a #b #c #d #e',
          mediaSource: 'https://img.example.com/x1.jpg',
        },
      });
      expect(credentials.ensureValid).not.toHaveBeenCalled();
      expect(mediaHost.host).not.toHaveBeenCalled();
      expect(publisher.initPublish).not.toHaveBeenCalled();
      expect(store.attempts).toHaveLength(0);
    });
  });

  describe('re-entry guard', () => {
    it('rejects a second execution for an item already in flight', async () => {
      const pipeline = createPipeline();
      const target = await item();

      const first = pipeline.execute(target);
      const second = await pipeline.execute(target);
      const firstOutcome = await first;

      expect(second.kind === 'recorded' && second.attempt.failureReason).toBe('already_in_progress');
      expect(firstOutcome.kind === 'recorded' && firstOutcome.attempt.status).toBe('published');
      expect(publisher.initPublish).toHaveBeenCalledTimes(1);
      expect(store.attempts).toHaveLength(2);
      expect(store.items.get('x1')?.postCount).toBe(1);
    });
  });

  describe('reconciliation of unconfirmed publishes', () => {
    function seedTimedOut(createdAt = new Date(FIXED_NOW.getTime() - HOUR / 2)) {
      store.attempts.push(
        makeAttempt({
          itemId: 'x1',
          status: 'failed',
          failureReason: 'confirmation_timeout',
          publishId: 'pub-old',
          postText: 'PR earlier text',
          hostedMediaUrl: 'https://i.ibb.co/old.jpg',
          createdAt,
        })
      );
    }

    it('records the earlier publish as published without re-posting', async () => {
      seedTimedOut();

      await createPipeline().execute(await item());

      expect(publisher.confirmStatus).toHaveBeenCalledWith('pub-old', 'access-1', undefined);
      expect(publisher.initPublish).not.toHaveBeenCalled();
      expect(mediaHost.host).not.toHaveBeenCalled();
      expect(store.attempts[1]).toMatchObject({
        status: 'published',
        reconciled: true,
        publishId: 'pub-old',
        postText: 'PR earlier text',
        hostedMediaUrl: 'https://i.ibb.co/old.jpg',
      });
      expect(store.items.get('x1')?.postCount).toBe(1);
    });

    it('does not re-post while the earlier publish is still processing', async () => {
      seedTimedOut();
      publisher.confirmStatus.mockResolvedValue({ status: 'processing' });

      await createPipeline().execute(await item());

      expect(publisher.initPublish).not.toHaveBeenCalled();
      expect(store.attempts[1]).toMatchObject({
        status: 'failed',
        failureReason: 'confirmation_timeout',
        publishId: 'pub-old',
      });
      expect(store.items.get('x1')?.postCount).toBe(0);
    });

    it('publishes afresh when the earlier publish was rejected', async () => {
      seedTimedOut();
      publisher.confirmStatus
        .mockResolvedValueOnce({ status: 'rejected', detail: 'internal' })
        .mockResolvedValueOnce({ status: 'published' });

      await createPipeline().execute(await item());

      expect(publisher.initPublish).toHaveBeenCalledTimes(1);
      expect(store.attempts[1]).toMatchObject({ status: 'published', publishId: 'pub-1', reconciled: false });
    });

    it('measures the window from the original publish, not from later checks', async () => {
      const seededAt = new Date(FIXED_NOW.getTime() - 30 * MINUTE);
      seedTimedOut(seededAt);
      publisher.confirmStatus.mockImplementation(async (publishId: string) =>
        publishId === 'pub-old' ? { status: 'processing' } : { status: 'published' }
      );
      let now = FIXED_NOW;
      const pipeline = createPipeline({}, { clock: () => now });

      for (const offset of [0, 20, 40]) {
        now = new Date(FIXED_NOW.getTime() + offset * MINUTE);
        await pipeline.execute(await item());
      }

      expect(store.attempts.slice(1).map((a) => [a.status, a.failureReason, a.publishId])).toEqual([
        ['failed', 'confirmation_timeout', 'pub-old'],
        ['failed', 'confirmation_timeout', 'pub-old'],
        ['published', null, 'pub-1'],
      ]);
      expect(store.attempts[2]).toMatchObject({
        createdAt: new Date(FIXED_NOW.getTime() + 20 * MINUTE),
        publishInitiatedAt: seededAt,
      });
      expect(store.attempts[3].publishInitiatedAt).toEqual(new Date(FIXED_NOW.getTime() + 40 * MINUTE));
      expect(publisher.initPublish).toHaveBeenCalledTimes(1);
      expect(store.items.get('x1')?.postCount).toBe(1);
    });

    it('publishes afresh when the remote no longer knows the earlier publish id', async () => {
      seedTimedOut();
      publisher.confirmStatus.mockRejectedValueOnce(
        new RemoteError('Publish status failed (invalid_publish_id)', false)
      );

      await createPipeline().execute(await item());

      expect(publisher.initPublish).toHaveBeenCalledTimes(1);
      expect(store.attempts[1]).toMatchObject({
        status: 'published',
        publishId: 'pub-1',
        postText: 'PR Item x1\n\n#a #b #c #d #e',
        reconciled: false,
      });
    });

    it('keeps waiting when the status check fails transiently', async () => {
      seedTimedOut();
      publisher.confirmStatus.mockRejectedValueOnce(new RemoteError('Publish status failed (HTTP 503)', true));

      await createPipeline().execute(await item());

      expect(publisher.initPublish).not.toHaveBeenCalled();
      expect(store.attempts[1]).toMatchObject({
        status: 'failed',
        failureReason: 'confirmation_timeout',
        publishId: 'pub-old',
        errorMessage: 'Publish status failed (HTTP 503)',
      });
    });

    it('ignores unconfirmed publishes older than the window', async () => {
      seedTimedOut(new Date(FIXED_NOW.getTime() - 2 * HOUR));

      await createPipeline().execute(await item());

      expect(publisher.confirmStatus).toHaveBeenCalledTimes(1);
      expect(publisher.confirmStatus).toHaveBeenCalledWith('pub-1', 'access-1', undefined);
      expect(store.attempts[1]).toMatchObject({ status: 'published', publishId: 'pub-1' });
    });
  });
});

describe('needsReconciliation', () => {
  const now = new Date('2026-03-01T12:00:00Z');

  it('is false without an earlier attempt', () => {
    expect(needsReconciliation(undefined, now, HOUR)).toBe(false);
  });

  it('only applies to confirmation timeouts that carry a publish id', () => {
    const base = { itemId: 'x1', createdAt: new Date(now.getTime() - 1000) };

    expect(needsReconciliation(makeAttempt({ ...base, failureReason: 'confirmation_timeout', publishId: 'p' }), now, HOUR)).toBe(true);
    expect(needsReconciliation(makeAttempt({ ...base, failureReason: 'confirmation_timeout' }), now, HOUR)).toBe(false);
    expect(needsReconciliation(makeAttempt({ ...base, failureReason: 'remote_rejected', publishId: 'p' }), now, HOUR)).toBe(false);
    expect(needsReconciliation(makeAttempt({ ...base, status: 'published', publishId: 'p' }), now, HOUR)).toBe(false);
  });

  it('ages a carried-over publish id from when it was first issued', () => {
    const attempt = makeAttempt({
      itemId: 'x1',
      failureReason: 'confirmation_timeout',
      publishId: 'p',
      createdAt: new Date(now.getTime() - 1000),
      publishInitiatedAt: new Date(now.getTime() - 2 * HOUR),
    });

    expect(needsReconciliation(attempt, now, HOUR)).toBe(false);
  });
});
