// ============================================================================
// Image Generation Service - Swipes / session / direct prompt -> image
// ============================================================================

import {
    findModel,
    GenerationRequestSchema,
    type AspectRatio,
    type GenerationRequest,
    type GenerationResult,
    type ModelDescriptor,
    type SwipeOutcome,
} from '@prefcanvas/shared';
import { ConfigurationError, InvalidInputError } from './errors.js';
import type { EvaluationSession } from './evaluationSession.js';
import type { GenerationCascade } from './imagePipeline.js';
import { extractLikedDescriptions } from './preferences.js';
import type { PromptSynthesis, PromptSynthesizer } from './promptSynthesizer.js';
import type { RejectingRateGuard } from './rateGuard.js';

export interface GenerationOptions {
    model?: string;
    aspectRatio?: AspectRatio;
    negativePrompt?: string;
    signal?: AbortSignal;
}

export interface ImageGenerationServiceDeps {
    synthesizer: PromptSynthesizer;
    cascade: GenerationCascade;
    guard: RejectingRateGuard;
    session: EvaluationSession;
    models: readonly ModelDescriptor[];
    defaultModel?: ModelDescriptor;
}

export const DIRECT_PROMPT_RATIONALE = 'The prompt was entered directly by the user.';

export class ImageGenerationService {
    constructor(private readonly deps: ImageGenerationServiceDeps) {}

    resolveModel(name?: string): ModelDescriptor {
        if (name?.trim()) {
            const model = findModel(name, this.deps.models);
            if (!model) throw new InvalidInputError(`Unknown model: ${name}`);
            return model;
        }
        if (!this.deps.defaultModel) throw new ConfigurationError('No generation model is available');
        return this.deps.defaultModel;
    }

    async generateFromSwipes(outcomes: readonly SwipeOutcome[], options: GenerationOptions = {}): Promise<GenerationResult> {
        const model = this.resolveModel(options.model);
        this.deps.guard.acquire();
        const synthesis = await this.deps.synthesizer.synthesize(extractLikedDescriptions(outcomes), { inputShape: model.inputShape });
        return this.run(synthesis, model, options);
    }

    async generateFromSession(options: GenerationOptions = {}): Promise<GenerationResult> {
        const model = this.resolveModel(options.model);
        this.deps.guard.acquire();
        const synthesis = await this.deps.synthesizer.synthesize(this.deps.session.likedDescriptions(), { inputShape: model.inputShape });
        return this.run(synthesis, model, options);
    }

    // The user's wording is used as-is, no quality keywords appended.
    async generateDirectly(prompt: string, options: GenerationOptions = {}): Promise<GenerationResult> {
        const trimmed = prompt.trim();
        if (!trimmed) throw new InvalidInputError('Prompt is required');
        const model = this.resolveModel(options.model);
        this.deps.guard.acquire();
        return this.run({ prompt: trimmed, rationale: DIRECT_PROMPT_RATIONALE, source: 'generic' }, model, options);
    }

    private run(synthesis: PromptSynthesis, model: ModelDescriptor, options: GenerationOptions): Promise<GenerationResult> {
        const request: GenerationRequest = GenerationRequestSchema.parse({
            prompt: synthesis.prompt,
            modelSelector: model.name,
            negativePrompt: options.negativePrompt?.trim() || synthesis.negativePrompt,
            aspectRatio: options.aspectRatio,
        });
        console.info('[Generation] request', { model: model.name, source: synthesis.source, aspectRatio: request.aspectRatio });
        return this.deps.cascade.generate(request, model, { rationale: synthesis.rationale, signal: options.signal });
    }
}
