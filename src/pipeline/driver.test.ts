import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { readFile, writeFile } from 'fs/promises';
import { MissingPrerequisiteError } from '../errors.js';
import {
  createTestRuntime,
  failingGenerator,
  projectFields,
  squareSite,
  type TestRuntime,
} from '../testing/fixtures.js';
import { describeOutcome } from './driver.js';

const statusesOf = async (ctx: TestRuntime, projectUuid: string) =>
  (await ctx.runtime.service.getPipelineStatus(projectUuid)).map((entry) => entry.task.status);

describe('PipelineDriver', () => {
  let ctx: TestRuntime;

  afterEach(async () => {
    await ctx.cleanup();
  });

  describe('chaining', () => {
    beforeEach(async () => {
      ctx = await createTestRuntime();
    });

    it('runs every step in order and stops past the last one', async () => {
      const { project, taskId } = await ctx.runtime.service.createProject(projectFields());
      await ctx.queue.drain();

      expect(await statusesOf(ctx, project.uuid)).toEqual(Array(8).fill('success'));
      expect(ctx.queue.submitted.map((unit) => unit.request.stepIndex)).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8]);
      expect(ctx.queue.submitted[0].taskId).toBe(taskId);
      expect(ctx.queue.size).toBe(0);
    });

    it('records the task id of the unit that ran each step', async () => {
      const { project } = await ctx.runtime.service.createProject(projectFields());
      await ctx.queue.drain();

      const entries = await ctx.runtime.service.getPipelineStatus(project.uuid);
      expect(entries.map((entry) => entry.task.task_id)).toEqual(
        ctx.queue.submitted.slice(0, 8).map((unit) => unit.taskId),
      );
    });

    it('stops before the exclusive bound', async () => {
      const { project } = await ctx.runtime.service.createProject(projectFields(), { autoStart: false });
      await ctx.runtime.service.startPipeline(project.uuid, { maxStep: 3 });
      await ctx.queue.drain();

      expect(await statusesOf(ctx, project.uuid)).toEqual([
        'success',
        'success',
        'success',
        '',
        '',
        '',
        '',
        '',
      ]);
      expect(ctx.queue.submitted.map((unit) => unit.request)).toEqual([
        { projectUuid: project.uuid, stepIndex: 0, maxStepIndex: 3 },
        { projectUuid: project.uuid, stepIndex: 1, maxStepIndex: 3 },
        { projectUuid: project.uuid, stepIndex: 2, maxStepIndex: 3 },
        { projectUuid: project.uuid, stepIndex: 3, maxStepIndex: 3 },
      ]);
    });

    it('does not advance from a step without its prerequisite', async () => {
      const { project } = await ctx.runtime.service.createProject(projectFields(), { autoStart: false });
      await ctx.runtime.service.startPipeline(project.uuid, { fromStep: 'clusters' });

      await expect(ctx.queue.drain()).rejects.toThrow(MissingPrerequisiteError);
      expect(await ctx.runtime.service.getStepStatus(project.uuid, 'clusters')).toMatchObject({
        status: 'failed',
        message: 'Missing previous process output: 01-streets',
      });
      expect(ctx.queue.submitted).toHaveLength(1);
    });

    it('replaces the output and status of a step that runs again', async () => {
      const { service, driver, locator } = ctx.runtime;
      const { project } = await service.createProject(projectFields(), { autoStart: false });
      await service.startPipeline(project.uuid, { maxStep: 2 });
      await ctx.queue.drain();
      expect(await statusesOf(ctx, project.uuid)).toEqual(['success', 'success', '', '', '', '', '', '']);

      const revised = squareSite();
      revised.features[0].properties = { name: 'revised-site' };
      await writeFile(locator.inputPath(project.uuid, 'site'), JSON.stringify(revised));

      const outcome = await driver.advance(
        { projectUuid: project.uuid, stepIndex: 0, maxStepIndex: 1 },
        { taskId: 'rerun' },
      );

      expect(outcome.state).toBe('advanced');
      const published = JSON.parse(await readFile(locator.locate(project.uuid, 'site', 'geojson'), 'utf8'));
      expect(published.features[0].properties).toEqual({ name: 'revised-site' });
      expect(await service.getStepStatus(project.uuid, 'site')).toEqual({
        task_id: 'rerun',
        status: 'success',
        message: 'STEP 00-site',
      });
    });

    it('terminates requests outside the registry without touching the project', async () => {
      const { driver } = ctx.runtime;
      const projectUuid = '7c9e6679-7425-40de-944b-e07fc1f90ae7';

      expect(await driver.advance({ projectUuid, stepIndex: 8 }, { taskId: 't' })).toEqual({
        state: 'terminated',
        reason: 'out-of-range',
      });
      expect(await driver.advance({ projectUuid, stepIndex: -1 }, { taskId: 't' })).toEqual({
        state: 'terminated',
        reason: 'out-of-range',
      });
      expect(
        await driver.advance({ projectUuid, stepIndex: 2, maxStepIndex: 2 }, { taskId: 't' }),
      ).toEqual({ state: 'terminated', reason: 'max-step-reached' });
      expect(ctx.queue.submitted).toHaveLength(0);
    });
  });

  it('stops at a failed step', async () => {
    ctx = await createTestRuntime({ generators: { clusters: failingGenerator('no buildable area') } });
    const { project } = await ctx.runtime.service.createProject(projectFields());
    await ctx.queue.drain();

    expect(await statusesOf(ctx, project.uuid)).toEqual(['success', 'success', 'failed', '', '', '', '', '']);
    expect(await ctx.runtime.service.getStepStatus(project.uuid, 2)).toMatchObject({
      message: 'no buildable area',
    });
    expect(ctx.queue.submitted.map((unit) => unit.request.stepIndex)).toEqual([0, 1, 2]);
  });

  it('summarises outcomes as plain data', async () => {
    ctx = await createTestRuntime();
    const { project } = await ctx.runtime.service.createProject(projectFields(), { autoStart: false });

    const outcome = await ctx.runtime.driver.advance({ projectUuid: project.uuid, stepIndex: 0 }, { taskId: 'first' });

    expect(describeOutcome(outcome)).toEqual({
      state: 'advanced',
      step: 'site',
      nextStepIndex: 1,
      nextTaskId: ctx.queue.submitted[0].taskId,
    });
    expect(describeOutcome({ state: 'terminated', reason: 'out-of-range' })).toEqual({
      state: 'terminated',
      reason: 'out-of-range',
    });
  });
});
