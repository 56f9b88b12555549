import express from 'express';
import type { Express, NextFunction, Request, Response } from 'express';
import { PipelineError, ValidationError } from './errors.js';
import { logger } from './logger.js';
import type { PipelineConfig } from './config.js';
import type { PipelineService } from './services/pipeline-service.js';
import { startPipelineSchema } from './schemas/project.js';
import type { Project } from './types/project.js';

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

/** Forward rejections to the error middleware (express 4 does not). */
const route =
  (handler: AsyncHandler) =>
  (req: Request, res: Response, next: NextFunction): void => {
    handler(req, res).catch(next);
  };

const toProjectResponse = (project: Project) => ({
  project_uuid: project.uuid,
  name: project.name,
  description: project.description,
  metadata: project.metadata,
  parameters: project.parameters,
  site: project.site,
  roads: project.roads,
  created_at: project.createdAt,
});

export const createServer = (
  service: PipelineService,
  config: Pick<PipelineConfig, 'apiPrefix'>,
): Express => {
  const app: Express = express();
  const api = express.Router();
  const fileUrl = (uuid: string, step: string, extension: string) =>
    `${config.apiPrefix}/projects/${uuid}/${step}.${extension}`;

  app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok' });
  });

  api.use(express.json({ limit: '10mb' }));

  api.post(
    '/projects',
    route(async (req, res) => {
      const { project, taskId } = await service.createProject(req.body);
      res.status(201).json({
        project_uuid: project.uuid,
        project_name: project.name,
        task_id: taskId,
        file: fileUrl(project.uuid, 'site', 'gltf'),
      });
    }),
  );

  api.get(
    '/projects/:uuid',
    route(async (req, res) => {
      const project = await service.getProject(req.params.uuid);
      res.json(toProjectResponse(project));
    }),
  );

  api.post(
    '/projects/:uuid/pipeline',
    route(async (req, res) => {
      const parse = startPipelineSchema.safeParse(req.body ?? {});
      if (!parse.success) {
        throw new ValidationError('Invalid pipeline request', parse.error.flatten());
      }
      const taskId = await service.startPipeline(req.params.uuid, {
        fromStep: parse.data.from_step,
        maxStep: parse.data.max_step,
      });
      res.status(202).json({ task_id: taskId });
    }),
  );

  api.get(
    '/projects/:uuid/steps',
    route(async (req, res) => {
      const steps = await service.getPipelineStatus(req.params.uuid);
      res.json({ steps });
    }),
  );

  // Registered before `/:step` which would otherwise match "site.geojson" too
  api.get(
    '/projects/:uuid/:step.:extension',
    route(async (req, res) => {
      const artifact = await service.getArtifactPath(req.params.uuid, req.params.step, req.params.extension);
      await new Promise<void>((resolve, reject) => {
        res.sendFile(
          artifact.path,
          { headers: { 'Content-Type': artifact.mediaType } },
          (err?: Error) => (err ? reject(err) : resolve()),
        );
      });
    }),
  );

  api.get(
    '/projects/:uuid/:step',
    route(async (req, res) => {
      const { uuid, step } = req.params;
      const task = await service.getStepStatus(uuid, step);
      res.json({ file: fileUrl(uuid, step, 'gltf'), task });
    }),
  );

  app.use(config.apiPrefix, api);

  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof ValidationError) {
      res.status(err.statusCode).json({ error: err.message, details: err.details });
      return;
    }
    if (err instanceof PipelineError) {
      res.status(err.statusCode).json({ error: err.message });
      return;
    }
    if (err instanceof SyntaxError) {
      res.status(400).json({ error: 'Malformed JSON body' });
      return;
    }
    logger.error({ err, method: req.method, path: req.path }, 'Request failed');
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
};
