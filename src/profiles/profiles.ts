import type { ProfileName, TranslationProfile } from '@/types/profiles.js';

/**
 * Entities known to appear in the chapter files, decoded in this order.
 * `&amp;` comes last so `&amp;lt;` turns into the text `&lt;`, not `<`.
 */
export const DEFAULT_ENTITIES: Readonly<Record<string, string>> = Object.freeze({
    '&#160;': ' ',
    '&nbsp;': ' ',
    '&lt;': '<',
    '&gt;': '>',
    '&quot;': '"',
    '&apos;': "'",
    '&amp;': '&',
});

const freezeProfile = (profile: TranslationProfile): TranslationProfile =>
    Object.freeze({
        ...profile,
        entities: Object.freeze({ ...profile.entities }),
        footnoteGlyphs: Object.freeze([...profile.footnoteGlyphs]),
        noiseSpans: Object.freeze(profile.noiseSpans.map((s) => Object.freeze({ ...s }))),
    });

/**
 * Built-in profiles.
 *
 * - `web`: footnotes live in `<span class="popup">` and leave `†‡§¶` behind; books are not ranked.
 * - `darby`: supplied words are wrapped in `[...]`; books are ranked in canonical order.
 */
export const PROFILES: Readonly<Record<ProfileName, TranslationProfile>> = Object.freeze({
    darby: freezeProfile({
        bookNumbering: 'canonical',
        entities: DEFAULT_ENTITIES,
        footnoteGlyphs: [],
        name: 'darby',
        noiseSpans: [],
        stripSupplyBrackets: true,
        translation: 'Darby',
    }),
    web: freezeProfile({
        bookNumbering: 'none',
        entities: DEFAULT_ENTITIES,
        footnoteGlyphs: ['†', '‡', '§', '¶'],
        name: 'web',
        noiseSpans: [{ className: 'popup', tag: 'span' }],
        stripSupplyBrackets: false,
        translation: 'WEB',
    }),
});

export const isProfileName = (name: string): name is ProfileName => Object.hasOwn(PROFILES, name);

/**
 * Looks up a built-in profile by name.
 *
 * @throws Error listing the available profiles when `name` is unknown
 */
export const getProfile = (name: string): TranslationProfile => {
    if (!isProfileName(name)) {
        throw new Error(`Unknown profile: ${name}. Available profiles: ${Object.keys(PROFILES).join(', ')}`);
    }
    return PROFILES[name];
};

/**
 * Accepts either a profile name or a profile object, as the public options do.
 */
export const resolveProfile = (profile: ProfileName | TranslationProfile = 'web'): TranslationProfile =>
    typeof profile === 'string' ? getProfile(profile) : profile;

/**
 * Derives a new frozen profile from a base one.
 *
 * @example
 * // Darby with the WEB footnote glyphs removed as well
 * const profile = defineProfile('darby', { footnoteGlyphs: ['†'], name: 'darby-clean' });
 */
export const defineProfile = (
    base: ProfileName | TranslationProfile,
    overrides: Partial<TranslationProfile>,
): TranslationProfile => freezeProfile({ ...resolveProfile(base), ...overrides });
