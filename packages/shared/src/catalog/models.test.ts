import { describe, expect, it } from 'vitest';
import type { ModelDescriptor } from '../types/generation.js';
import { findModel, getDefaultModel, getJobFallbackModel, isNativeModel, MODEL_CATALOG } from './models.js';

const textModel: ModelDescriptor = {
    name: 'Text Only',
    backendIdentifier: 'owner/text-only',
    versionIdentifier: 'v1',
    inputShape: 'simpleText',
};

const flagModel: ModelDescriptor = {
    name: 'Flag Only',
    backendIdentifier: 'owner/flag-only',
    versionIdentifier: 'v2',
    inputShape: 'flagOnly',
};

describe('model catalog', () => {
    it('is frozen', () => {
        expect(Object.isFrozen(MODEL_CATALOG)).toBe(true);
        expect(Object.isFrozen(MODEL_CATALOG[0])).toBe(true);
    });

    it('finds models by name or backend identifier, ignoring case', () => {
        expect(findModel('sd 3.5 large')?.backendIdentifier).toBe('stability-ai/stable-diffusion-3.5-large');
        expect(findModel('IMAGEN-3.0-GENERATE-001')?.name).toBe('Google Imagen 3');
        expect(findModel('  ')).toBeUndefined();
        expect(findModel('unknown model')).toBeUndefined();
    });

    it('defaults to the first native model', () => {
        expect(getDefaultModel()?.name).toBe('Google Imagen 3');
        expect(isNativeModel(MODEL_CATALOG[0])).toBe(true);
    });

    it('defaults to the first text model when no native model exists', () => {
        expect(getDefaultModel([flagModel, textModel])).toBe(textModel);
        expect(getDefaultModel([flagModel])).toBe(flagModel);
        expect(getDefaultModel([])).toBeUndefined();
    });

    it('picks a text model as the job fallback for native selections', () => {
        expect(getJobFallbackModel()?.name).toBe('Miaomiao Harem');
        expect(getJobFallbackModel([flagModel])).toBeUndefined();
    });
});
