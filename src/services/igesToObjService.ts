import fs from 'fs/promises';
import path from 'path';
import type { ConversionOutput, MeshTool, UploadedFile } from '../types';
import { ConversionError, errorMessage, IOError, ValidationError } from '../utils/errors';
import type { Logger } from '../utils/logger';
import { withStagingDir } from '../utils/staging';
import { INPUT_FILENAME, OUTPUT_FILENAME } from './containerMeshTool';

const IGES_EXTENSIONS = ['.igs', '.iges'];

export function hasIgesExtension(filename: string): boolean {
  return IGES_EXTENSIONS.some(ext => filename.endsWith(ext));
}

export function outputFilenameFor(originalname: string): string {
  const base = path.parse(originalname).name || 'output';
  return `${base}.obj`;
}

async function exists(file: string): Promise<boolean> {
  try {
    await fs.access(file);
    return true;
  } catch {
    return false;
  }
}

export interface IgesToObjServiceOptions {
  stagingRoot: string;
  meshTool: MeshTool;
}

export default class IgesToObjService {
  constructor(private readonly options: IgesToObjServiceOptions) {}

  public async convert(upload: UploadedFile | undefined, logger: Logger): Promise<ConversionOutput> {
    if (!upload) {
      throw new ValidationError('No file uploaded. Use form field name "file".');
    }
    if (!hasIgesExtension(upload.originalname)) {
      throw new ValidationError('Invalid file type. Please upload an .igs or .iges file.');
    }

    return withStagingDir(this.options.stagingRoot, logger, async (dir) => {
      const inputPath = path.join(dir, INPUT_FILENAME);
      const outputPath = path.join(dir, OUTPUT_FILENAME);

      try {
        await fs.writeFile(inputPath, upload.buffer);
      } catch (err) {
        throw new IOError(`Error saving file: ${errorMessage(err)}`, { cause: err });
      }

      await this.options.meshTool.run(dir, logger);

      if (!(await exists(outputPath))) {
        throw new ConversionError('Conversion failed: Output file not created.');
      }

      // read before the staging directory goes away
      const data = await fs.readFile(outputPath);
      return { filename: outputFilenameFor(upload.originalname), data };
    });
  }
}
