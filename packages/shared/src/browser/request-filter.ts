export type RouteDecision = 'continue' | 'abort';

// Challenge traffic always goes through
const CHALLENGE_DOMAINS = [
    'recaptcha',
    'google.com',
    'googleapis.com',
    'gstatic.com',
    'googleusercontent.com',
    'google-analytics.com'
];

const ALLOWED_TYPES = new Set(['document', 'script', 'xhr', 'fetch', 'websocket']);
const BLOCKED_TYPES = new Set(['image', 'stylesheet', 'font', 'media']);

/**
 * Decide whether a request made by a challenge page is worth loading.
 * Heavy assets are dropped; anything that can carry the challenge is kept.
 */
export function decideRoute(url: string, resourceType: string): RouteDecision {
    const lowered = url.toLowerCase();

    if (CHALLENGE_DOMAINS.some(domain => lowered.includes(domain))) {
        return 'continue';
    }
    if (ALLOWED_TYPES.has(resourceType)) {
        return 'continue';
    }
    if (BLOCKED_TYPES.has(resourceType)) {
        return 'abort';
    }
    if (resourceType === 'other') {
        return lowered.includes('google') ? 'continue' : 'abort';
    }
    return 'continue';
}
