import express, { Express, Request, Response, NextFunction } from 'express';
import multer from 'multer';
import { ZodError } from 'zod';
import { main, parseMetadata, RegressionError } from '../shared/index';

export type UploadResponse = { status: number; body: unknown };

/**
 * Runs the analysis for one upload and maps failures to HTTP statuses:
 * 400 for missing or invalid input, 422 when the regression itself fails.
 */
export function handleUpload(csvFile: Buffer | undefined, rawMetadata: unknown): UploadResponse {
    if (!csvFile) {
        return { status: 400, body: { error: 'No file uploaded' } };
    }

    if (typeof rawMetadata !== 'string' || rawMetadata.length === 0) {
        return { status: 400, body: { error: 'No metadata provided' } };
    }

    let parsedJson: unknown;
    try {
        parsedJson = JSON.parse(rawMetadata);
    } catch {
        return { status: 400, body: { error: 'Metadata is not valid JSON' } };
    }

    try {
        const metadata = parseMetadata(parsedJson);
        return { status: 200, body: main(metadata, csvFile.toString()) };
    } catch (error) {
        if (error instanceof ZodError)
            return { status: 400, body: { error: 'Invalid metadata', issues: error.issues } };
        if (error instanceof RegressionError)
            return { status: 422, body: { error: error.name, message: error.message } };
        throw error;
    }
}

export function createApp(): Express {
    const app = express();

    // Middleware to parse JSON bodies
    app.use(express.json());

    // Set up multer for file handling
    const upload = multer({ storage: multer.memoryStorage() });

    app.post('/api/upload', upload.single('csvFile'), (req: Request, res: Response, next: NextFunction): void => {
        try {
            const { status, body } = handleUpload(req.file?.buffer, req.body.metadata);
            res.status(status).json(body);
        } catch (error) {
            next(error);
        }
    });

    return app;
}
