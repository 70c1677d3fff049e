import { describe, it, expect } from 'vitest';
import type { Bounds } from '@layerforge/shared';
import { Settings } from '../../../config/settings';
import { FakeImage } from '../../../__tests__/helpers/fakes';
import { Job } from '../job';
import { JobQueue } from '../job-queue';
import type { JobSelection } from '../job-queue';

const bounds: Bounds = { x: 0, y: 0, width: 512, height: 512 };

function makeQueue(historySize = 1000): JobQueue {
  return new JobQueue(new Settings({ historySize }));
}

function addFinished(queue: JobQueue, id: string, sizeMb: number): Job {
  const job = queue.add('diffusion', `prompt ${id}`, bounds);
  job.assignId(id);
  queue.setResults(job, [new FakeImage(undefined, sizeMb)]);
  queue.notifyFinished(job);
  return job;
}

describe('Job', () => {
  it('starts queued without id or results', () => {
    const job = new Job(null, 'diffusion', 'a cat', bounds);
    expect(job.id).toBeNull();
    expect(job.state).toBe('queued');
    expect(job.results).toEqual([]);
    expect(job.resultSize).toBe(0);
    expect(job.control).toBeNull();
  });

  it('accepts an id only once', () => {
    const job = new Job(null, 'diffusion', 'a cat', bounds);
    job.assignId('job-1');
    expect(job.id).toBe('job-1');
    expect(() => job.assignId('job-2')).toThrow('Job job-1 already has an id, cannot assign job-2');
    expect(job.id).toBe('job-1');
  });

  it('sums result sizes in bytes', () => {
    const job = new Job('job-1', 'diffusion', 'a cat', bounds);
    job.attachResults([new FakeImage(undefined, 2), new FakeImage(undefined, 3)]);
    expect(job.resultSize).toBe(5 * 1024 * 1024);
  });
});

describe('JobQueue', () => {
  describe('add', () => {
    it('appends a queued job without id and notifies the count', () => {
      const queue = makeQueue();
      let counts = 0;
      queue.countChanged$.subscribe(() => counts++);

      const job = queue.add('diffusion', 'a cat', bounds);

      expect(queue.length).toBe(1);
      expect(queue.at(0)).toBe(job);
      expect(job.id).toBeNull();
      expect(job.state).toBe('queued');
      expect(counts).toBe(1);
    });

    it('names upscale jobs after the target size', () => {
      const queue = makeQueue();
      const job = queue.addUpscale({ x: 0, y: 0, width: 1024, height: 768 });
      expect(job.kind).toBe('upscaling');
      expect(job.prompt).toBe('[Upscale] 1024x768');
    });

    it('keeps the prompt of live jobs', () => {
      const queue = makeQueue();
      const job = queue.addLive('a cat', bounds);
      expect(job.kind).toBe('live_preview');
      expect(job.prompt).toBe('a cat');
    });
  });

  describe('find', () => {
    it('finds jobs by server id', () => {
      const queue = makeQueue();
      const job = queue.add('diffusion', 'a cat', bounds);
      job.assignId('job-7');
      expect(queue.find('job-7')).toBe(job);
    });

    it('returns undefined for unknown ids and jobs still waiting for an id', () => {
      const queue = makeQueue();
      queue.add('diffusion', 'a cat', bounds);
      expect(queue.find('job-404')).toBeUndefined();
    });
  });

  describe('state notifications', () => {
    it('moves a queued job to executing once', () => {
      const queue = makeQueue();
      const job = queue.add('diffusion', 'a cat', bounds);
      let counts = 0;
      queue.countChanged$.subscribe(() => counts++);

      queue.notifyStarted(job);
      queue.notifyStarted(job);

      expect(job.state).toBe('executing');
      expect(queue.anyExecuting()).toBe(true);
      expect(queue.count('executing')).toBe(1);
      expect(counts).toBe(1);
    });

    it('does not move a finished job back to executing', () => {
      const queue = makeQueue();
      const job = addFinished(queue, 'job-1', 1);
      queue.notifyStarted(job);
      expect(job.state).toBe('finished');
    });

    it('emits finished before the count change', () => {
      const queue = makeQueue();
      const job = queue.add('diffusion', 'a cat', bounds);
      const events: string[] = [];
      queue.jobFinished$.subscribe((j) => events.push(`finished:${j.prompt}`));
      queue.countChanged$.subscribe(() => events.push('count'));

      queue.notifyFinished(job);

      expect(job.state).toBe('finished');
      expect(events).toEqual(['finished:a cat', 'count']);
    });

    it('publishes cancelled jobs', () => {
      const queue = makeQueue();
      const job = queue.add('diffusion', 'a cat', bounds);
      const cancelled: Job[] = [];
      queue.jobCancelled$.subscribe((j) => cancelled.push(j));

      queue.notifyCancelled(job);

      expect(job.state).toBe('cancelled');
      expect(cancelled).toEqual([job]);
      expect(queue.count('cancelled')).toBe(1);
    });
  });

  describe('memory accounting', () => {
    it('counts diffusion results in MB', () => {
      const queue = makeQueue();
      addFinished(queue, 'job-1', 50);
      addFinished(queue, 'job-2', 40);
      expect(queue.memoryUsage).toBe(90);
    });

    it('does not count results of other job kinds', () => {
      const queue = makeQueue();
      const job = queue.addUpscale(bounds);
      queue.setResults(job, [new FakeImage(undefined, 30)]);
      expect(queue.memoryUsage).toBe(0);
      expect(job.results).toHaveLength(1);
    });

    it('replaces the contribution of earlier results', () => {
      const queue = makeQueue();
      const job = addFinished(queue, 'job-1', 50);
      queue.setResults(job, [new FakeImage(undefined, 20)]);
      expect(queue.memoryUsage).toBe(20);
    });

    it('releases memory when a diffusion job is removed', () => {
      const queue = makeQueue();
      const first = addFinished(queue, 'job-1', 50);
      addFinished(queue, 'job-2', 40);

      queue.remove(first);

      expect(queue.memoryUsage).toBe(40);
      expect(queue.length).toBe(1);
    });

    it('ignores removal of a job that is not queued', () => {
      const queue = makeQueue();
      const job = addFinished(queue, 'job-1', 50);
      queue.remove(job);
      queue.remove(job);
      expect(queue.memoryUsage).toBe(0);
      expect(queue.length).toBe(0);
    });
  });

  describe('prune', () => {
    it('evicts the oldest job once the budget is exceeded', () => {
      const queue = makeQueue(90);
      const first = addFinished(queue, 'job-1', 50);
      const second = addFinished(queue, 'job-2', 40);
      expect(queue.length).toBe(2);

      const third = addFinished(queue, 'job-3', 10);

      expect([...queue]).toEqual([second, third]);
      expect(queue.find(first.id ?? '')).toBeUndefined();
      expect(queue.memoryUsage).toBe(50);
    });

    it('evicts in submission order until usage fits', () => {
      const queue = makeQueue(30);
      addFinished(queue, 'job-1', 10);
      addFinished(queue, 'job-2', 10);
      addFinished(queue, 'job-3', 10);

      const fourth = addFinished(queue, 'job-4', 25);

      expect([...queue].map((j) => j.id)).toEqual(['job-4']);
      expect(queue.at(0)).toBe(fourth);
      expect(queue.memoryUsage).toBe(25);
    });

    it('evicts by age, not by result size', () => {
      const queue = makeQueue(30);
      const small = addFinished(queue, 'job-1', 5);
      const large = addFinished(queue, 'job-2', 20);

      const latest = addFinished(queue, 'job-3', 10);

      expect([...queue]).toEqual([large, latest]);
      expect(queue.find(small.id ?? '')).toBeUndefined();
      expect(queue.memoryUsage).toBe(30);
    });

    it('keeps an oversized job until a newer result arrives', () => {
      const queue = makeQueue(40);
      const first = addFinished(queue, 'job-1', 50);
      expect([...queue]).toEqual([first]);
      expect(queue.memoryUsage).toBe(50);

      const second = addFinished(queue, 'job-2', 10);

      expect([...queue]).toEqual([second]);
      expect(queue.memoryUsage).toBe(10);
    });

    it('never evicts the job that just received results', () => {
      const queue = makeQueue(10);
      const job = addFinished(queue, 'job-1', 50);
      expect([...queue]).toEqual([job]);
      expect(queue.memoryUsage).toBe(50);
    });

    it('evicts older jobs of any kind without touching the accumulator', () => {
      const queue = makeQueue(10);
      queue.addUpscale(bounds);
      const job = addFinished(queue, 'job-1', 20);
      expect([...queue]).toEqual([job]);
      expect(queue.memoryUsage).toBe(20);
    });

    it('keeps memory usage equal to the results held by diffusion jobs', () => {
      const queue = makeQueue(64);
      for (let i = 1; i <= 8; i++) {
        addFinished(queue, `job-${i}`, 8 + i);
      }
      const held = [...queue]
        .filter((j) => j.kind === 'diffusion')
        .reduce((total, j) => total + j.resultSize / (1024 * 1024), 0);
      expect(queue.memoryUsage).toBe(held);
      expect(queue.memoryUsage).toBeLessThanOrEqual(64);
    });

    it('notifies the count once per pruning pass', () => {
      const queue = makeQueue(25);
      addFinished(queue, 'job-1', 10);
      addFinished(queue, 'job-2', 10);
      const job = queue.add('diffusion', 'a cat', bounds);
      let counts = 0;
      queue.countChanged$.subscribe(() => counts++);

      queue.setResults(job, [new FakeImage(undefined, 20)]);

      expect(queue.length).toBe(1);
      expect(counts).toBe(1);
    });
  });

  describe('selection', () => {
    it('notifies every selection, even when unchanged', () => {
      const queue = makeQueue();
      const selections: (JobSelection | null)[] = [];
      queue.selectionChanged$.subscribe((s) => selections.push(s));

      queue.select('job-1', 0);
      queue.select('job-1', 0);
      queue.clearSelection();

      expect(selections).toEqual([{ jobId: 'job-1', index: 0 }, { jobId: 'job-1', index: 0 }, null]);
      expect(queue.selection).toBeNull();
    });
  });
});
