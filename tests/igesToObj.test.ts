import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import IgesToObjService, { hasIgesExtension, outputFilenameFor } from '../src/services/igesToObjService';
import type { MeshTool } from '../src/types';
import { ConversionError, IOError, TimeoutError, UnexpectedError, ValidationError } from '../src/utils/errors';
import { createLogger } from '../src/utils/logger';

const logger = createLogger('test', { level: 'silent' });

class RecordingMeshTool implements MeshTool {
    public readonly dirs: string[] = [];
    public inputSeen = '';

    constructor(private readonly behaviour: (dir: string) => Promise<void>) {}

    async run(stagingDir: string): Promise<void> {
        this.dirs.push(stagingDir);
        this.inputSeen = await fs.readFile(path.join(stagingDir, 'input.igs'), 'utf8');
        await this.behaviour(stagingDir);
    }
}

const writesObj = (content: string) => async (dir: string) => {
    await fs.writeFile(path.join(dir, 'output.obj'), content);
};

async function exists(p: string): Promise<boolean> {
    return fs.access(p).then(() => true, () => false);
}

describe('IgesToObjService', () => {
    let stagingRoot: string;

    beforeEach(async () => {
        stagingRoot = await fs.mkdtemp(path.join(os.tmpdir(), 'iges-service-test-'));
    });

    afterEach(async () => {
        jest.restoreAllMocks();
        await fs.rm(stagingRoot, { recursive: true, force: true });
    });

    it('should stage the upload, run the tool and return the OBJ bytes', async () => {
        const tool = new RecordingMeshTool(writesObj('o part\nv 0 0 0\n'));
        const service = new IgesToObjService({ stagingRoot, meshTool: tool });

        const output = await service.convert({ originalname: 'part.igs', buffer: Buffer.from('IGES-DATA') }, logger);

        expect(output.filename).toBe('part.obj');
        expect(output.data.toString('utf8')).toBe('o part\nv 0 0 0\n');
        expect(tool.inputSeen).toBe('IGES-DATA');
        expect(tool.dirs).toHaveLength(1);
        expect(path.dirname(tool.dirs[0])).toBe(stagingRoot);
        expect(await exists(tool.dirs[0])).toBe(false);
    });

    it('should accept the long .iges extension', async () => {
        const service = new IgesToObjService({ stagingRoot, meshTool: new RecordingMeshTool(writesObj('o x\n')) });

        const output = await service.convert({ originalname: 'bracket.iges', buffer: Buffer.from('x') }, logger);

        expect(output.filename).toBe('bracket.obj');
    });

    it('should reject a missing upload', async () => {
        const service = new IgesToObjService({ stagingRoot, meshTool: new RecordingMeshTool(writesObj('')) });

        await expect(service.convert(undefined, logger))
            .rejects.toThrow(new ValidationError('No file uploaded. Use form field name "file".'));
    });

    it.each(['part.txt', 'part.IGS', 'part.Iges', 'part.igs.bak', 'igs'])(
        'should reject %s before touching the filesystem',
        async (originalname) => {
            const tool = new RecordingMeshTool(writesObj(''));
            const service = new IgesToObjService({ stagingRoot, meshTool: tool });

            const attempt = service.convert({ originalname, buffer: Buffer.from('x') }, logger);

            await expect(attempt).rejects.toBeInstanceOf(ValidationError);
            await expect(attempt).rejects.toThrow('Invalid file type. Please upload an .igs or .iges file.');
            expect(tool.dirs).toEqual([]);
            expect(await fs.readdir(stagingRoot)).toEqual([]);
        }
    );

    it('should report a failed write of the upload before running the tool', async () => {
        const diskFull = Object.assign(new Error('ENOSPC: no space left on device, write'), { code: 'ENOSPC' });
        jest.spyOn(fs, 'writeFile').mockRejectedValueOnce(diskFull);
        const tool = new RecordingMeshTool(writesObj('o part\n'));
        const service = new IgesToObjService({ stagingRoot, meshTool: tool });

        const attempt = service.convert({ originalname: 'part.igs', buffer: Buffer.from('IGES-DATA') }, logger);

        await expect(attempt).rejects.toBeInstanceOf(IOError);
        await expect(attempt).rejects.toThrow('Error saving file: ENOSPC: no space left on device, write');
        await expect(attempt).rejects.toHaveProperty('cause', diskFull);
        expect(tool.dirs).toEqual([]);
        expect(await fs.readdir(stagingRoot)).toEqual([]);
    });

    it('should fail when the tool exits cleanly without output', async () => {
        const tool = new RecordingMeshTool(async () => undefined);
        const service = new IgesToObjService({ stagingRoot, meshTool: tool });

        const attempt = service.convert({ originalname: 'empty.igs', buffer: Buffer.from('x') }, logger);

        await expect(attempt).rejects.toBeInstanceOf(ConversionError);
        await expect(attempt).rejects.toThrow('Conversion failed: Output file not created.');
        expect(await exists(tool.dirs[0])).toBe(false);
    });

    it('should clean up after a tool timeout', async () => {
        const timeout = new TimeoutError('Conversion timed out after 60000 ms.');
        const tool = new RecordingMeshTool(async (dir) => {
            await writesObj('partial')(dir);
            throw timeout;
        });
        const service = new IgesToObjService({ stagingRoot, meshTool: tool });

        await expect(service.convert({ originalname: 'big.igs', buffer: Buffer.from('x') }, logger)).rejects.toBe(timeout);
        expect(await fs.readdir(stagingRoot)).toEqual([]);
    });

    it('should report a staging root that cannot be used as unexpected', async () => {
        const tool = new RecordingMeshTool(writesObj(''));
        const service = new IgesToObjService({ stagingRoot: path.join(stagingRoot, 'missing'), meshTool: tool });

        await expect(service.convert({ originalname: 'part.igs', buffer: Buffer.from('x') }, logger))
            .rejects.toBeInstanceOf(UnexpectedError);
        expect(tool.dirs).toEqual([]);
    });
});

describe('file names', () => {
    it('should match extensions case-sensitively', () => {
        expect(hasIgesExtension('a.igs')).toBe(true);
        expect(hasIgesExtension('a.iges')).toBe(true);
        expect(hasIgesExtension('a.IGES')).toBe(false);
        expect(hasIgesExtension('a.step')).toBe(false);
    });

    it('should derive the download name from the upload stem', () => {
        expect(outputFilenameFor('part.igs')).toBe('part.obj');
        expect(outputFilenameFor('assembly.v2.iges')).toBe('assembly.v2.obj');
        expect(outputFilenameFor('nested/dir/wing.igs')).toBe('wing.obj');
    });
});
