// ============================================================================
// Procedural Image - Offline SVG art rasterized with sharp
// ============================================================================

import sharp from 'sharp';
import type { GeneratedImage, GenerationRequest, ModelDescriptor } from '@prefcanvas/shared';
import { errorMessage } from './errors.js';
import type { ImageBackend } from './imagePipeline.js';
import { loadKeywordLists, type KeywordLists } from './keywords.js';

export type ProceduralStyle = 'pastel' | 'night' | 'nature' | 'ocean' | 'warm';
type Motif = 'starBursts' | 'waveLines' | 'lightBursts' | 'geometricShapes';

interface Palette {
    background: [string, string];
    accents: string[];
    text: string;
}

const CANVAS_SIZE = 1024;
const MAX_PROMPT_CHARS = 60;

const STYLES: Record<ProceduralStyle, { palette: Palette; motif: Motif }> = {
    pastel: {
        palette: { background: ['#ffd1dc', '#e0c3fc'], accents: ['#ffffff', '#ffe4f2', '#c8e7ff', '#fff5ba'], text: '#6b4a7a' },
        motif: 'starBursts',
    },
    night: {
        palette: { background: ['#0f0c29', '#302b63'], accents: ['#f8f8ff', '#ffd700', '#9fa8ff', '#e0e0ff'], text: '#e6e6fa' },
        motif: 'lightBursts',
    },
    nature: {
        palette: { background: ['#a8e063', '#2f7336'], accents: ['#f1f8e9', '#c5e1a5', '#7cb342', '#fff59d'], text: '#1b3a1e' },
        motif: 'waveLines',
    },
    ocean: {
        palette: { background: ['#2193b0', '#0b3d5c'], accents: ['#e0f7fa', '#80deea', '#4dd0e1', '#ffffff'], text: '#e0f7fa' },
        motif: 'waveLines',
    },
    warm: {
        palette: { background: ['#ff9966', '#ff5e62'], accents: ['#fff3e0', '#ffcc80', '#ffab91', '#ffe082'], text: '#4e2a1e' },
        motif: 'geometricShapes',
    },
};

// Checked in this order; the first style with a hit wins.
const STYLE_PRIORITY = ['pastel', 'night', 'nature', 'ocean'] as const;

export function classifyPrompt(prompt: string, lists: KeywordLists = loadKeywordLists()): ProceduralStyle {
    const lower = prompt.toLowerCase();
    return STYLE_PRIORITY.find((style) => lists.proceduralStyles[style].some((keyword) => lower.includes(keyword))) ?? 'warm';
}

export function escapeXml(value: string): string {
    return value
        .replace(/&/g, '&amp;')
        .replace(/</g, '&lt;')
        .replace(/>/g, '&gt;')
        .replace(/"/g, '&quot;')
        .replace(/'/g, '&apos;');
}

export function truncatePrompt(prompt: string, max = MAX_PROMPT_CHARS): string {
    const flat = prompt.replace(/\s+/g, ' ').trim();
    return flat.length > max ? `${flat.slice(0, max).trimEnd()}…` : flat;
}

type Random = () => number;

const between = (random: Random, min: number, max: number) => min + random() * (max - min);
const pick = <T>(random: Random, items: readonly T[]): T => items[Math.floor(random() * items.length) % items.length];
const fixed = (value: number) => value.toFixed(1);

function starBursts(palette: Palette, random: Random): string {
    const shapes: string[] = [];
    for (let i = 0; i < 14; i++) {
        const cx = between(random, 60, CANVAS_SIZE - 60);
        const cy = between(random, 60, CANVAS_SIZE - 60);
        const outer = between(random, 18, 64);
        const inner = outer * 0.45;
        const points: string[] = [];
        for (let p = 0; p < 10; p++) {
            const radius = p % 2 === 0 ? outer : inner;
            const angle = (Math.PI / 5) * p - Math.PI / 2;
            points.push(`${fixed(cx + radius * Math.cos(angle))},${fixed(cy + radius * Math.sin(angle))}`);
        }
        shapes.push(`<polygon points="${points.join(' ')}" fill="${pick(random, palette.accents)}" opacity="${fixed(between(random, 0.5, 0.95))}"/>`);
    }
    return shapes.join('');
}

function waveLines(palette: Palette, random: Random): string {
    const lines: string[] = [];
    for (let i = 0; i < 8; i++) {
        const baseY = between(random, 120, CANVAS_SIZE - 80);
        const amplitude = between(random, 15, 60);
        const wavelength = between(random, 160, 320);
        const segments: string[] = [`M 0 ${fixed(baseY)}`];
        for (let x = 0; x <= CANVAS_SIZE; x += wavelength / 2) {
            const direction = Math.round(x / (wavelength / 2)) % 2 === 0 ? -1 : 1;
            segments.push(`Q ${fixed(x + wavelength / 4)} ${fixed(baseY + amplitude * direction)} ${fixed(x + wavelength / 2)} ${fixed(baseY)}`);
        }
        lines.push(`<path d="${segments.join(' ')}" stroke="${pick(random, palette.accents)}" stroke-width="${fixed(between(random, 3, 10))}" fill="none" opacity="${fixed(between(random, 0.4, 0.85))}"/>`);
    }
    return lines.join('');
}

function lightBursts(palette: Palette, random: Random): string {
    const bursts: string[] = [];
    for (let i = 0; i < 40; i++) {
        const r = i < 6 ? between(random, 40, 110) : between(random, 1.5, 5);
        bursts.push(`<circle cx="${fixed(between(random, 0, CANVAS_SIZE))}" cy="${fixed(between(random, 0, CANVAS_SIZE))}" r="${fixed(r)}" fill="${i < 6 ? 'url(#glow)' : pick(random, palette.accents)}" opacity="${fixed(between(random, 0.5, 1))}"/>`);
    }
    return bursts.join('');
}

function geometricShapes(palette: Palette, random: Random): string {
    const shapes: string[] = [];
    for (let i = 0; i < 12; i++) {
        const x = between(random, 40, CANVAS_SIZE - 160);
        const y = between(random, 40, CANVAS_SIZE - 160);
        const size = between(random, 50, 160);
        const fill = pick(random, palette.accents);
        const opacity = fixed(between(random, 0.35, 0.8));
        const rotation = fixed(between(random, 0, 360));
        const kind = pick(random, ['rect', 'circle', 'triangle'] as const);
        if (kind === 'circle') {
            shapes.push(`<circle cx="${fixed(x + size / 2)}" cy="${fixed(y + size / 2)}" r="${fixed(size / 2)}" fill="${fill}" opacity="${opacity}"/>`);
        } else if (kind === 'rect') {
            shapes.push(`<rect x="${fixed(x)}" y="${fixed(y)}" width="${fixed(size)}" height="${fixed(size)}" fill="${fill}" opacity="${opacity}" transform="rotate(${rotation} ${fixed(x + size / 2)} ${fixed(y + size / 2)})"/>`);
        } else {
            shapes.push(`<polygon points="${fixed(x + size / 2)},${fixed(y)} ${fixed(x + size)},${fixed(y + size)} ${fixed(x)},${fixed(y + size)}" fill="${fill}" opacity="${opacity}" transform="rotate(${rotation} ${fixed(x + size / 2)} ${fixed(y + size / 2)})"/>`);
        }
    }
    return shapes.join('');
}

const MOTIFS: Record<Motif, (palette: Palette, random: Random) => string> = {
    starBursts,
    waveLines,
    lightBursts,
    geometricShapes,
};

export function renderSvg(prompt: string, style: ProceduralStyle, random: Random = Math.random): string {
    const { palette, motif } = STYLES[style];
    const caption = escapeXml(truncatePrompt(prompt));
    const size = CANVAS_SIZE;

    return `<svg xmlns="http://www.w3.org/2000/svg" width="${size}" height="${size}" viewBox="0 0 ${size} ${size}">
<defs>
<linearGradient id="bg" x1="0" y1="0" x2="1" y2="1">
<stop offset="0%" stop-color="${palette.background[0]}"/>
<stop offset="100%" stop-color="${palette.background[1]}"/>
</linearGradient>
<radialGradient id="glow">
<stop offset="0%" stop-color="${palette.accents[0]}" stop-opacity="0.9"/>
<stop offset="100%" stop-color="${palette.accents[0]}" stop-opacity="0"/>
</radialGradient>
</defs>
<rect width="${size}" height="${size}" fill="url(#bg)"/>
${MOTIFS[motif](palette, random)}
<text x="${size / 2}" y="${size - 96}" text-anchor="middle" font-family="sans-serif" font-size="28" fill="${palette.text}">${caption}</text>
<text x="${size - 24}" y="${size - 24}" text-anchor="end" font-family="sans-serif" font-size="22" font-weight="bold" fill="${palette.text}" opacity="0.6">DEMO</text>
</svg>`;
}

export type Rasterizer = (svg: string) => Promise<Buffer>;

export const rasterizeWithSharp: Rasterizer = (svg) => sharp(Buffer.from(svg)).png().toBuffer();

export interface ProceduralImageOptions {
    random?: Random;
    rasterize?: Rasterizer;
    lists?: KeywordLists;
}

export class ProceduralImageSynthesizer {
    private readonly random: Random;
    private readonly rasterize: Rasterizer;
    private readonly lists: KeywordLists;

    constructor(options: ProceduralImageOptions = {}) {
        this.random = options.random ?? Math.random;
        this.rasterize = options.rasterize ?? rasterizeWithSharp;
        this.lists = options.lists ?? loadKeywordLists();
    }

    /** Never throws; falls back to the raw SVG when rasterization fails. */
    async synthesize(prompt: string): Promise<GeneratedImage> {
        const style = classifyPrompt(prompt, this.lists);
        const svg = renderSvg(prompt, style, this.random);
        console.info(`[Procedural] rendering ${style} artwork`);

        try {
            const png = await this.rasterize(svg);
            if (png.length) return { data: png, mimeType: 'image/png', width: CANVAS_SIZE, height: CANVAS_SIZE };
            console.warn('[Procedural] rasterizer returned no bytes, returning SVG');
        } catch (error) {
            console.warn('[Procedural] rasterization failed, returning SVG:', errorMessage(error));
        }
        return { data: Buffer.from(svg, 'utf8'), mimeType: 'image/svg+xml', width: CANVAS_SIZE, height: CANVAS_SIZE };
    }
}

export class ProceduralBackend implements ImageBackend {
    readonly id = 'procedural' as const;

    constructor(private readonly synthesizer: ProceduralImageSynthesizer = new ProceduralImageSynthesizer()) {}

    generate(request: GenerationRequest, _model: ModelDescriptor): Promise<GeneratedImage> {
        return this.synthesizer.synthesize(request.prompt);
    }
}
