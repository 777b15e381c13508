// ============================================================================
// API App - Fastify instance, routes and service wiring
// ============================================================================

import Fastify, { type FastifyInstance, type FastifyReply } from 'fastify';
import cors from '@fastify/cors';
import { z, ZodError } from 'zod';
import {
    AspectRatioSchema,
    EvaluationResultSchema,
    getJobFallbackModel,
    InlineImageSchema,
    SwipeDirectionSchema,
    SwipeOutcomeSchema,
    type GenerationResult,
} from '@prefcanvas/shared';
import type { AppConfig } from './config.js';
import { errorMessage, InvalidInputError, QuotaExceededError } from './services/errors.js';
import { EvaluationSession } from './services/evaluationSession.js';
import { GeminiContentModel, ImageAnalysisService } from './services/gemini.js';
import { ImageGenerationService } from './services/generation.js';
import { GenerationCascade } from './services/imagePipeline.js';
import { ProceduralBackend } from './services/proceduralImage.js';
import { PromptSynthesizer } from './services/promptSynthesizer.js';
import { createAnalysisGuard, createGenerationGuard } from './services/rateGuard.js';
import { ReplicateClient } from './services/replicate.provider.js';
import { createAdcRefresher, VertexImagenClient, VertexTokenSource } from './services/vertex.provider.js';

export interface AppDeps {
    config: Readonly<AppConfig>;
    session: EvaluationSession;
    analysis: ImageAnalysisService;
    synthesizer: PromptSynthesizer;
    generation: ImageGenerationService;
}

export function createAppDeps(config: Readonly<AppConfig>): AppDeps {
    const session = new EvaluationSession();
    const analysis = new ImageAnalysisService({
        model: config.gemini.apiKey ? new GeminiContentModel(config.gemini.apiKey, config.gemini.model) : undefined,
        guard: createAnalysisGuard(config.limits.analysisPerMinute),
    });
    const synthesizer = new PromptSynthesizer(analysis);

    const tokens = new VertexTokenSource({
        staticToken: config.vertex.accessToken,
        refresh: config.vertex.useApplicationDefaultCredentials ? createAdcRefresher() : undefined,
    });
    const cascade = new GenerationCascade({
        native: new VertexImagenClient({ projectId: config.vertex.projectId, location: config.vertex.location, tokens }),
        job: new ReplicateClient({ apiToken: config.replicate.apiToken, maxPollAttempts: config.replicate.maxPollAttempts }),
        procedural: new ProceduralBackend(),
        order: config.cascadeOrder,
        jobFallbackModel: getJobFallbackModel(config.models),
    });

    const generation = new ImageGenerationService({
        synthesizer,
        cascade,
        guard: createGenerationGuard(config.limits.generationPerHour),
        session,
        models: config.models,
        defaultModel: config.defaultModel,
    });

    return { config, session, analysis, synthesizer, generation };
}

// ============================================================================
// Request bodies
// ============================================================================

const AnalyzeBodySchema = z.object({
    images: z.array(InlineImageSchema).min(1).max(24),
});

const EvaluateBodySchema = z.object({
    imageId: z.string().min(1).optional(),
    direction: SwipeDirectionSchema,
    image: InlineImageSchema,
});

const PromptBodySchema = z.object({
    likedDescriptions: z.array(z.string()).default([]),
    model: z.string().optional(),
});

const GenerationOptionsSchema = z.object({
    model: z.string().optional(),
    aspectRatio: AspectRatioSchema.optional(),
    negativePrompt: z.string().optional(),
});

const GenerateBodySchema = GenerationOptionsSchema.extend({
    swipes: z.array(SwipeOutcomeSchema).optional(),
});

const DirectGenerateBodySchema = GenerationOptionsSchema.extend({
    prompt: z.string().trim().min(1, 'Prompt is required'),
});

const PreferencesBodySchema = z.object({
    evaluations: z.array(EvaluationResultSchema).optional(),
});

const OptimizeBodySchema = z.object({
    prompt: z.string().trim().min(1, 'Prompt is required'),
    evaluations: z.array(EvaluationResultSchema).optional(),
});

function toGenerationResponse(result: GenerationResult) {
    return {
        image: {
            data: result.image.data.toString('base64'),
            mimeType: result.image.mimeType,
        },
        prompt: result.prompt,
        rationale: result.rationale ?? '',
        backend: result.backend,
        attempts: result.attempts,
    };
}

// ============================================================================
// App
// ============================================================================

export async function buildApp(deps: AppDeps): Promise<FastifyInstance> {
    const { config, session, analysis, synthesizer, generation } = deps;

    const fastify = Fastify({
        logger: config.server.logLevel === 'silent' ? false : { level: config.server.logLevel },
        bodyLimit: config.server.bodyLimit,
    });

    await fastify.register(cors, {
        origin: config.server.frontendUrl,
        methods: ['GET', 'POST'],
    });

    function sendError(reply: FastifyReply, error: unknown, label: string) {
        if (error instanceof ZodError) {
            return reply.status(400).send({
                error: 'Invalid request',
                message: error.issues.map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`).join('; '),
            });
        }
        if (error instanceof InvalidInputError) {
            return reply.status(400).send({ error: 'Invalid request', message: error.message });
        }
        if (error instanceof QuotaExceededError) {
            return reply
                .status(429)
                .header('retry-after', String(Math.ceil(error.retryAfterMs / 1000)))
                .send({ error: 'Quota exceeded', message: error.message, retryAfterMs: error.retryAfterMs });
        }
        fastify.log.error(error);
        return reply.status(500).send({ error: label, message: errorMessage(error) });
    }

    // ------------------------------------------------------------------------
    // Status
    // ------------------------------------------------------------------------

    fastify.get('/api/health', async () => ({
        status: 'ok',
        timestamp: new Date().toISOString(),
        gemini: {
            model: config.gemini.model,
            apiKeyPresent: Boolean(config.gemini.apiKey),
            analysisAvailable: analysis.configured,
        },
        vertex: {
            projectConfigured: Boolean(config.vertex.projectId),
            location: config.vertex.location,
            staticTokenPresent: Boolean(config.vertex.accessToken),
            applicationDefaultCredentials: config.vertex.useApplicationDefaultCredentials,
        },
        replicate: {
            apiTokenPresent: Boolean(config.replicate.apiToken),
        },
        cascadeOrder: config.cascadeOrder,
        sessionEvaluations: session.size,
    }));

    fastify.get('/api/models', async () => ({
        models: config.models,
        defaultModel: config.defaultModel?.name ?? null,
    }));

    // ------------------------------------------------------------------------
    // Analysis and session
    // ------------------------------------------------------------------------

    fastify.post('/api/analyze', async (request, reply) => {
        try {
            const { images } = AnalyzeBodySchema.parse(request.body);
            fastify.log.info({ images: images.length }, 'analyze: start');
            const descriptions = await analysis.describeImages(images);
            return { descriptions };
        } catch (error) {
            return sendError(reply, error, 'Failed to analyze images');
        }
    });

    fastify.post('/api/evaluate', async (request, reply) => {
        try {
            const { image, direction, imageId } = EvaluateBodySchema.parse(request.body);
            const evaluation = await analysis.evaluateSwipedImage(image, direction, session, imageId);
            return { evaluation };
        } catch (error) {
            return sendError(reply, error, 'Failed to evaluate image');
        }
    });

    fastify.get('/api/session', async () => ({ evaluations: session.snapshot() }));

    fastify.post('/api/session/reset', async () => {
        session.reset();
        return { success: true };
    });

    fastify.post('/api/preferences', async (request, reply) => {
        try {
            const { evaluations } = PreferencesBodySchema.parse(request.body ?? {});
            const result = await analysis.analyzeUserPreferences(evaluations ?? session.snapshot());
            return { analysis: result };
        } catch (error) {
            return sendError(reply, error, 'Failed to analyze preferences');
        }
    });

    // ------------------------------------------------------------------------
    // Prompts
    // ------------------------------------------------------------------------

    fastify.post('/api/prompt', async (request, reply) => {
        try {
            const { likedDescriptions, model } = PromptBodySchema.parse(request.body ?? {});
            const target = generation.resolveModel(model);
            return await synthesizer.synthesize(likedDescriptions, { inputShape: target.inputShape });
        } catch (error) {
            return sendError(reply, error, 'Failed to synthesize prompt');
        }
    });

    fastify.post('/api/prompt/optimize', async (request, reply) => {
        try {
            const { prompt, evaluations } = OptimizeBodySchema.parse(request.body);
            const preferences = await analysis.analyzeUserPreferences(evaluations ?? session.snapshot());
            return { prompt: await analysis.optimizePrompt(prompt, preferences) };
        } catch (error) {
            return sendError(reply, error, 'Failed to optimize prompt');
        }
    });

    // ------------------------------------------------------------------------
    // Generation
    // ------------------------------------------------------------------------

    fastify.post('/api/generate', async (request, reply) => {
        try {
            const { swipes, ...options } = GenerateBodySchema.parse(request.body ?? {});
            fastify.log.info({ swipes: swipes?.length ?? 0, model: options.model }, 'generate: start');
            const result = swipes
                ? await generation.generateFromSwipes(swipes, options)
                : await generation.generateFromSession(options);
            fastify.log.info({ backend: result.backend, attempts: result.attempts.length }, 'generate: complete');
            return toGenerationResponse(result);
        } catch (error) {
            return sendError(reply, error, 'Failed to generate image');
        }
    });

    fastify.post('/api/generate-direct', async (request, reply) => {
        try {
            const { prompt, ...options } = DirectGenerateBodySchema.parse(request.body);
            const result = await generation.generateDirectly(prompt, options);
            return toGenerationResponse(result);
        } catch (error) {
            return sendError(reply, error, 'Failed to generate image');
        }
    });

    return fastify;
}
