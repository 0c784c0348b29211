import { Router, Request, Response } from 'express';
import { AffirmationPipeline, PipelineRunResult } from '../../application/AffirmationPipeline';
import { getVariant, listVariantNames } from '../../config/variants';
import { asyncHandler, BadRequestError } from '../middleware/errorHandler';

interface GenerateBody {
    variant?: string;
    theme?: string;
}

function readOptionalString(body: unknown, key: keyof GenerateBody): string | undefined {
    if (typeof body !== 'object' || body === null || !(key in body)) {
        return undefined;
    }
    const value: unknown = Reflect.get(body, key);
    if (value === undefined || value === null) {
        return undefined;
    }
    if (typeof value !== 'string' || !value.trim()) {
        throw new BadRequestError(`"${key}" must be a non-empty string`);
    }
    return value.trim();
}

export function toGenerateResponse(result: PipelineRunResult): Record<string, unknown> {
    return {
        status: 'success',
        variant: result.variant,
        theme: result.theme,
        affirmations: result.affirmations,
        caption: result.caption,
        facebook_posted: result.facebookPosted,
        instagram_posted: result.instagramPosted,
        publish_results: result.results,
    };
}

/**
 * Creates the pipeline trigger routes.
 */
export function createGenerateRoutes(pipeline: AffirmationPipeline): Router {
    const router = Router();

    /**
     * GET /
     *
     * Liveness banner.
     */
    router.get('/', (req: Request, res: Response) => {
        res.json({ status: 'running', message: 'Affirmation Posting Service' });
    });

    /**
     * GET /variants
     *
     * Names accepted by POST /generate.
     */
    router.get('/variants', (req: Request, res: Response) => {
        res.json({ variants: listVariantNames() });
    });

    /**
     * POST /generate
     *
     * Runs the whole pipeline synchronously and reports what was posted.
     * Body (optional): { variant?: string, theme?: string }
     */
    router.post(
        '/generate',
        asyncHandler(async (req: Request, res: Response) => {
            const body: unknown = req.body;
            const variant = readOptionalString(body, 'variant');
            const theme = readOptionalString(body, 'theme');

            if (variant && !getVariant(variant)) {
                throw new BadRequestError(`Unknown variant "${variant}". Available: ${listVariantNames().join(', ')}`);
            }

            console.log(`[API] /generate requested (variant: ${variant ?? 'default'})`);
            const result = await pipeline.run({ variant, theme });
            res.json(toGenerateResponse(result));
        })
    );

    return router;
}
