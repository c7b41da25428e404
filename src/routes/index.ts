import { Express, RequestHandler } from 'express';
import multer from 'multer';
import ConvertController from '../controllers/convertController';
import { errorMessage, ValidationError } from '../utils/errors';

interface UploadOptions extends multer.Options {
    // browsers send the multipart filename as raw UTF-8
    defParamCharset?: string;
}

const uploadOptions: UploadOptions = {
    // uploads stay in memory until the extension has been checked
    storage: multer.memoryStorage(),
    defParamCharset: 'utf8',
    limits: { files: 1 },
};

const upload = multer(uploadOptions);

/**
 * Multer and busboy failures (unexpected field, truncated body) are the
 * client's fault, so they surface as a 400.
 */
function acceptUpload(field: string): RequestHandler {
    const single = upload.single(field);
    return (req, res, next) => {
        single(req, res, (err?: unknown) => {
            if (err) {
                next(new ValidationError(`Invalid upload: ${errorMessage(err)}`, { cause: err }));
                return;
            }
            next();
        });
    };
}

export function setRoutes(app: Express, convertController: ConvertController) {
    // GET / — static upload form
    app.get('/', convertController.handleIndex.bind(convertController));

    // POST /convert — accepts multipart form field "file" and returns an OBJ download
    app.post('/convert', acceptUpload('file'), convertController.handleConvert.bind(convertController));
}
