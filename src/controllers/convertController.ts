import { Request, Response } from 'express';
import fs from 'fs/promises';
import path from 'path';
import IgesToObjService from '../services/igesToObjService';
import { toConverterError, toErrorBody } from '../utils/errors';
import type { Logger } from '../utils/logger';

export const MISSING_PAGE_HTML = '<h1>Error: index.html not found</h1>';

export default class ConvertController {
  constructor(
    private readonly service: IgesToObjService,
    private readonly staticDir: string
  ) {}

  public async handleIndex(req: Request, res: Response) {
    const logger: Logger = res.locals.logger;
    try {
      const html = await fs.readFile(path.join(this.staticDir, 'index.html'), 'utf8');
      res.type('html').send(html);
    } catch (err) {
      logger.error('Upload page unavailable', { staticDir: this.staticDir }, err);
      res.status(500).type('html').send(MISSING_PAGE_HTML);
    }
  }

  public async handleConvert(req: Request, res: Response) {
    const logger: Logger = res.locals.logger;
    logger.info('Conversion requested', {
      filename: req.file?.originalname,
      size: req.file?.size,
    });

    try {
      const result = await this.service.convert(req.file, logger);
      logger.info('Conversion succeeded', { filename: result.filename, bytes: result.data.length });

      res.attachment(result.filename);
      res.setHeader('Content-Type', 'application/octet-stream');
      res.send(result.data);
    } catch (err) {
      const error = toConverterError(err);
      if (error.statusCode >= 500) {
        logger.error('Conversion failed', { kind: error.kind }, error);
      } else {
        logger.warn('Conversion rejected', { kind: error.kind, detail: error.message });
      }
      res.status(error.statusCode).json(toErrorBody(error));
    }
  }
}
