import express, { Express } from 'express';
import cors from 'cors';
import type { AppConfig } from './config';
import ConvertController from './controllers/convertController';
import { errorHandler, requestContext } from './middleware/requestContext';
import { setRoutes } from './routes/index';
import { ContainerMeshTool } from './services/containerMeshTool';
import IgesToObjService from './services/igesToObjService';
import type { MeshTool } from './types';
import { createLogger, Logger } from './utils/logger';

export interface CreateAppOptions {
  config: AppConfig;
  logger?: Logger;
  meshTool?: MeshTool;
}

export function createApp({ config, logger, meshTool }: CreateAppOptions): Express {
  const log = logger ?? createLogger('iges-to-obj', { level: config.logLevel });
  const service = new IgesToObjService({
    stagingRoot: config.stagingRoot,
    meshTool: meshTool ?? new ContainerMeshTool(config),
  });
  const controller = new ConvertController(service, config.staticDir);

  const app = express();
  app.use(cors());
  app.use(requestContext(log));
  app.use('/static', express.static(config.staticDir));

  setRoutes(app, controller);

  app.use(errorHandler(log));
  return app;
}
