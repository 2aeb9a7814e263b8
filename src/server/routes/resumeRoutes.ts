import express, { Router } from 'express';
import type { Request, Response } from 'express';
import { z } from 'zod';
import { detectDocumentKind } from '../extraction/ResumeTextExtractor.js';
import { commonSchemas, parseQuery } from '../middleware/validation.js';
import type { ResumeProcessingPipeline } from '../services/resume/ResumeProcessingPipeline.js';
import type { UploadedDocument } from '../types/resume.js';
import { asyncHandler } from '../utils/errorHandling.js';
import { logger } from '../utils/logger.js';

const analyzeQuerySchema = z.object({
    adjust: commonSchemas.queryBoolean.default('false'),
    filename: z.string().trim().min(1).max(255).optional(),
});

type ResumePipeline = Pick<ResumeProcessingPipeline, 'process'>;

function readUpload(req: Request, filename: string | undefined): UploadedDocument {
    // express.raw leaves req.body untouched when the request has no body
    const buffer: Buffer = Buffer.isBuffer(req.body) ? req.body : Buffer.alloc(0);
    const headerName = req.get('x-filename');

    const name = filename ?? (headerName ? headerName.trim() : undefined);
    return {
        buffer,
        byteLength: buffer.length,
        kind: detectDocumentKind(req.get('content-type'), name),
        filename: name,
    };
}

export function createResumeRoutes(pipeline: ResumePipeline, maxUploadBytes: number): Router {
    const router = Router();

    /**
     * POST /resume/analyze?adjust=true|false[&filename=cv.pdf]
     * Body: the raw file (application/pdf or text/plain)
     *
     * adjust=false → { analysis, suggestions, score }
     * adjust=true  → application/pdf attachment with the rewritten resume
     */
    router.post(
        '/analyze',
        // Any content type is read as bytes; unsupported formats are rejected after reading
        express.raw({ type: () => true, limit: maxUploadBytes }),
        asyncHandler(async (req: Request, res: Response) => {
            const { adjust, filename } = parseQuery(analyzeQuerySchema, req);
            const document = readUpload(req, filename);

            logger.info(
                { adjust, kind: document.kind, byteLength: document.byteLength, filename: document.filename },
                'Processing resume upload'
            );

            const outcome = await pipeline.process(document, adjust);

            if (outcome.kind === 'analysis') {
                res.json(outcome.report);
                return;
            }

            res.setHeader('Content-Type', 'application/pdf');
            res.setHeader('Content-Disposition', `attachment; filename="${outcome.filename}"`);
            res.setHeader('Content-Length', outcome.pdf.length);
            res.send(outcome.pdf);
        })
    );

    return router;
}
