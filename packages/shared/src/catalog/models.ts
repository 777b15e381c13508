// ============================================================================
// Model Catalog - Static list of generation models and their request shapes
// ============================================================================

import type { InputShape, ModelDescriptor } from '../types/generation.js';

const MODELS: ModelDescriptor[] = [
    {
        name: 'Google Imagen 3',
        backendIdentifier: 'imagen-3.0-generate-001',
        versionIdentifier: 'native',
        inputShape: 'nativeCloud',
    },
    {
        name: 'Google Imagen 3 Fast',
        backendIdentifier: 'imagen-3.0-fast-generate-001',
        versionIdentifier: 'native',
        inputShape: 'nativeCloud',
    },
    {
        name: 'Miaomiao Harem',
        backendIdentifier: 'aisha-ai-official/miaomiao-harem-illustrious-v1',
        versionIdentifier: 'd74eab7842eca403256b37c4276e0c19b83aa124cc5d102d15d9327a6d14ad02',
        inputShape: 'simpleText',
    },
    {
        name: 'SD 3.5 Medium',
        backendIdentifier: 'stability-ai/stable-diffusion-3.5-medium',
        versionIdentifier: '17deaafb14e6c18aa88e57bf02149da2b23c2f2c3d02cf9d6ad3cc59b6c44327',
        inputShape: 'simpleText',
    },
    {
        name: 'SD 3.5 Large',
        backendIdentifier: 'stability-ai/stable-diffusion-3.5-large',
        versionIdentifier: 'a9b41e4dfe8ade1b0b1ea088e0e3b69bcd58a89f1a2b6ab74b39b46dd3aa9c6d',
        inputShape: 'simpleText',
    },
    {
        name: 'Ninjitsu Art',
        backendIdentifier: 'ninjitsu-ai/ninjitsu-art',
        versionIdentifier: '9ce0d5a5e5b1b1b7b6a0e1b0c1b0c1b0c1b0c1b0c1b0c1b0c1b0c1b0c1b0c1b0',
        inputShape: 'flagOnly',
    },
];

export const MODEL_CATALOG: readonly ModelDescriptor[] = Object.freeze(MODELS.map((model) => Object.freeze({ ...model })));

export function isNativeModel(model: ModelDescriptor): boolean {
    return model.inputShape === 'nativeCloud';
}

export function findModel(name?: string, catalog: readonly ModelDescriptor[] = MODEL_CATALOG): ModelDescriptor | undefined {
    const requested = (name || '').trim().toLowerCase();
    if (!requested) return undefined;
    return catalog.find((model) =>
        model.name.toLowerCase() === requested || model.backendIdentifier.toLowerCase() === requested,
    );
}

function firstWithShape(shape: InputShape, catalog: readonly ModelDescriptor[]) {
    return catalog.find((model) => model.inputShape === shape);
}

// Native first, then the first plain text-to-image model.
export function getDefaultModel(catalog: readonly ModelDescriptor[] = MODEL_CATALOG): ModelDescriptor | undefined {
    return firstWithShape('nativeCloud', catalog)
        ?? firstWithShape('simpleText', catalog)
        ?? catalog[0];
}

// Job-API model used when the caller picked a native model and the native backend fails.
export function getJobFallbackModel(catalog: readonly ModelDescriptor[] = MODEL_CATALOG): ModelDescriptor | undefined {
    return firstWithShape('simpleText', catalog) ?? firstWithShape('structuredImagen', catalog);
}
