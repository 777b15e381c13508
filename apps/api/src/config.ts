// ============================================================================
// Configuration - Environment parsed once into an immutable object
// ============================================================================

import { z } from 'zod';
import { findModel, getDefaultModel, MODEL_CATALOG, type ModelDescriptor } from '@prefcanvas/shared';
import { isPlaceholderCredential } from './services/errors.js';

export type CascadeOrder = 'native-first' | 'selected-first';

const optionalSecret = z
    .string()
    .optional()
    .transform((value) => (isPlaceholderCredential(value) ? undefined : (value || '').trim()));

const booleanFlag = (fallback: boolean) => z
    .string()
    .optional()
    .transform((value) => {
        const normalized = (value || '').trim().toLowerCase();
        if (!normalized) return fallback;
        return !['0', 'false', 'no', 'off'].includes(normalized);
    });

const EnvSchema = z.object({
    PORT: z.coerce.number().int().positive().default(3001),
    HOST: z.string().default('0.0.0.0'),
    FRONTEND_URL: z.string().default('http://localhost:5173'),
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
    API_BODY_LIMIT: z.coerce.number().int().positive().default(25 * 1024 * 1024),

    GEMINI_API_KEY: optionalSecret,
    GEMINI_MODEL: z.string().trim().min(1).default('gemini-1.5-flash'),

    VERTEX_PROJECT_ID: optionalSecret,
    VERTEX_LOCATION: z.string().trim().min(1).default('us-central1'),
    VERTEX_ACCESS_TOKEN: optionalSecret,
    VERTEX_USE_ADC: booleanFlag(true),

    REPLICATE_API_TOKEN: optionalSecret,
    REPLICATE_MAX_POLL_ATTEMPTS: z.coerce.number().int().min(1).max(600).default(60),

    ANALYSIS_LIMIT_PER_MINUTE: z.coerce.number().int().positive().default(60),
    GENERATION_LIMIT_PER_HOUR: z.coerce.number().int().positive().default(30),
    CASCADE_ORDER: z.enum(['native-first', 'selected-first']).default('native-first'),
    DEFAULT_MODEL: z.string().optional(),
});

export interface AppConfig {
    server: {
        port: number;
        host: string;
        frontendUrl: string;
        logLevel: z.infer<typeof EnvSchema>['LOG_LEVEL'];
        bodyLimit: number;
    };
    gemini: {
        apiKey?: string;
        model: string;
    };
    vertex: {
        projectId?: string;
        location: string;
        accessToken?: string;
        useApplicationDefaultCredentials: boolean;
    };
    replicate: {
        apiToken?: string;
        maxPollAttempts: number;
    };
    limits: {
        analysisPerMinute: number;
        generationPerHour: number;
    };
    cascadeOrder: CascadeOrder;
    models: readonly ModelDescriptor[];
    defaultModel?: ModelDescriptor;
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
    for (const key of Object.keys(value)) {
        const child: unknown = Reflect.get(value, key);
        if (child && typeof child === 'object' && !Object.isFrozen(child)) {
            deepFreeze(child);
        }
    }
    return Object.freeze(value);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Readonly<AppConfig> {
    const parsed = EnvSchema.safeParse(env);
    if (!parsed.success) {
        const details = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
        throw new Error(`Invalid environment configuration: ${details}`);
    }
    const vars = parsed.data;

    return deepFreeze<AppConfig>({
        server: {
            port: vars.PORT,
            host: vars.HOST,
            frontendUrl: vars.FRONTEND_URL,
            logLevel: vars.LOG_LEVEL,
            bodyLimit: vars.API_BODY_LIMIT,
        },
        gemini: {
            apiKey: vars.GEMINI_API_KEY,
            model: vars.GEMINI_MODEL,
        },
        vertex: {
            projectId: vars.VERTEX_PROJECT_ID,
            location: vars.VERTEX_LOCATION,
            accessToken: vars.VERTEX_ACCESS_TOKEN,
            useApplicationDefaultCredentials: vars.VERTEX_USE_ADC,
        },
        replicate: {
            apiToken: vars.REPLICATE_API_TOKEN,
            maxPollAttempts: vars.REPLICATE_MAX_POLL_ATTEMPTS,
        },
        limits: {
            analysisPerMinute: vars.ANALYSIS_LIMIT_PER_MINUTE,
            generationPerHour: vars.GENERATION_LIMIT_PER_HOUR,
        },
        cascadeOrder: vars.CASCADE_ORDER,
        models: MODEL_CATALOG,
        defaultModel: findModel(vars.DEFAULT_MODEL) ?? getDefaultModel(),
    });
}
