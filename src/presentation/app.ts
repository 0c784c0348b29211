import express, { Application, NextFunction, Request, Response } from 'express';
import cors from 'cors';
import { Config } from '../config';
import { AffirmationPipeline } from '../application/AffirmationPipeline';
import { MediaComposer } from '../application/MediaComposer';
import { ContainerPoller } from '../application/publishing/ContainerPoller';
import { FacebookPublisher } from '../application/publishing/FacebookPublisher';
import { InstagramPublisher } from '../application/publishing/InstagramPublisher';
import { IMetricsPort } from '../domain/ports/IMetricsPort';
import { IStorageClient } from '../domain/ports/IStorageClient';

// Infrastructure imports
import { OpenAIService } from '../infrastructure/llm/OpenAIService';
import { AffirmationContentGenerator } from '../infrastructure/llm/AffirmationContentGenerator';
import { FFmpegVideoRenderer } from '../infrastructure/video/FFmpegVideoRenderer';
import { SharpImageRenderer } from '../infrastructure/images/SharpImageRenderer';
import { GraphApiClient } from '../infrastructure/graph/GraphApiClient';
import { S3StorageClient } from '../infrastructure/storage/S3StorageClient';
import { MediaStorageClient } from '../infrastructure/storage/MediaStorageClient';
import { ConsoleMetricsAdapter, NoOpMetricsAdapter } from '../infrastructure/metrics/ConsoleMetricsAdapter';
import { PrometheusMetricsAdapter } from '../infrastructure/metrics/PrometheusMetricsAdapter';

// Route imports
import { createGenerateRoutes } from './routes/generateRoutes';
import { errorHandler, NotFoundError } from './middleware/errorHandler';

export interface AppDependencies {
    pipeline: AffirmationPipeline;
    metrics: IMetricsPort;
}

const VERSION = '1.0.0';

/**
 * Creates and configures the Express application.
 */
export function createApp(config: Config, dependencies: AppDependencies = createDependencies(config)): Application {
    const app = express();

    // Middleware
    app.use(cors());
    app.use(express.json());

    // Health check
    app.get('/health', (req: Request, res: Response) => {
        res.json({
            status: 'ok',
            timestamp: new Date().toISOString(),
            version: VERSION,
        });
    });

    const { metrics } = dependencies;
    if (metrics instanceof PrometheusMetricsAdapter) {
        app.get('/metrics', (req: Request, res: Response, next: NextFunction) => {
            metrics.getMetrics()
                .then((body) => {
                    res.set('Content-Type', metrics.contentType);
                    res.send(body);
                })
                .catch(next);
        });
    }

    // Routes
    app.use(createGenerateRoutes(dependencies.pipeline));

    app.use((req: Request) => {
        throw new NotFoundError(`Route not found: ${req.method} ${req.path}`);
    });

    // Error handler (must be last)
    app.use(errorHandler);

    return app;
}

export function createMetrics(config: Config): IMetricsPort {
    switch (config.metricsBackend) {
        case 'prometheus':
            return new PrometheusMetricsAdapter();
        case 'none':
            return new NoOpMetricsAdapter();
        default:
            return new ConsoleMetricsAdapter();
    }
}

function createStorage(config: Config): IStorageClient {
    if (config.storageProvider === 'cloudinary') {
        return new MediaStorageClient(
            config.cloudinaryCloudName,
            config.cloudinaryApiKey,
            config.cloudinaryApiSecret
        );
    }
    return new S3StorageClient({
        region: config.awsRegion,
        accessKeyId: config.awsAccessKeyId,
        secretAccessKey: config.awsSecretAccessKey,
    });
}

/**
 * Creates all dependencies with proper wiring.
 */
export function createDependencies(config: Config): AppDependencies {
    const metrics = createMetrics(config);

    const llm = new OpenAIService(config.openaiApiKey, config.openaiModel, config.openaiBaseUrl);
    const contentGenerator = new AffirmationContentGenerator(llm, metrics);
    const composer = new MediaComposer(new FFmpegVideoRenderer(), new SharpImageRenderer());

    const graph = new GraphApiClient(config.graphApiBaseUrl);
    const poller = new ContainerPoller(graph, metrics);

    const facebookPublisher = new FacebookPublisher(graph, {
        pageId: config.facebookPageId,
        accessToken: config.facebookAccessToken,
    }, metrics);

    const instagramPublisher = new InstagramPublisher(graph, createStorage(config), poller, {
        pageId: config.facebookPageId,
        accessToken: config.facebookAccessToken,
        accountId: config.instagramAccountId,
        bucket: config.s3BucketName,
        reelPoll: { intervalMs: config.igPollIntervalMs, maxAttempts: config.igMaxPollAttempts },
        carouselPoll: { intervalMs: config.igCarouselPollIntervalMs, maxAttempts: config.igCarouselMaxPollAttempts },
    }, metrics);

    const pipeline = new AffirmationPipeline({
        contentGenerator,
        composer,
        facebookPublisher,
        instagramPublisher,
        metrics,
    }, {
        assetsDir: config.assetsDir,
        outputDir: config.outputDir,
        defaultVariant: config.pipelineVariant,
    });

    return { pipeline, metrics };
}
