/**
 * Scripts evaluated inside the challenge page. Each one is a self-contained
 * expression so the result crosses back as a plain JSON value.
 */

export const RECAPTCHA_SCRIPT_URL = 'https://www.google.com/recaptcha/api.js';

export const GRECAPTCHA_READY_EXPRESSION =
    "!!(window.grecaptcha && typeof window.grecaptcha.execute === 'function')";

export const SCRIPT_TAG_PRESENT_EXPRESSION =
    '!!document.querySelector(\'script[src*="recaptcha/api.js"]\')';

export function buildScriptUrl(siteKey: string): string {
    return `${RECAPTCHA_SCRIPT_URL}?render=${encodeURIComponent(siteKey)}`;
}

/**
 * Appends the api.js tag and resolves to whether it loaded.
 */
export function buildInjectScript(scriptUrl: string): string {
    return `new Promise((resolve) => {
    const script = document.createElement('script');
    script.src = ${JSON.stringify(scriptUrl)};
    script.async = true;
    script.defer = true;
    script.onload = () => resolve(true);
    script.onerror = () => resolve(false);
    document.head.appendChild(script);
})`;
}

/**
 * Resolves to `{ token }` or `{ error }`, never rejects. Waits on
 * `grecaptcha.ready` (or polls for it) no longer than `readyTimeoutMs`.
 */
export function buildExecuteScript(siteKey: string, action: string, readyTimeoutMs: number): string {
    return `new Promise((resolve) => {
    let resolved = false;
    const finish = (value) => {
        if (resolved) return;
        resolved = true;
        resolve(value);
    };

    const execute = () => {
        if (!window.grecaptcha) return finish({ error: 'window.grecaptcha is missing' });
        if (typeof window.grecaptcha.execute !== 'function') {
            return finish({ error: 'window.grecaptcha.execute is not a function' });
        }
        try {
            Promise.resolve(window.grecaptcha.execute(${JSON.stringify(siteKey)}, { action: ${JSON.stringify(action)} }))
                .then((token) => finish({ token: String(token) }))
                .catch((error) => finish({ error: (error && error.message) || String(error) }));
        } catch (error) {
            finish({ error: (error && error.message) || String(error) });
        }
    };

    const timeoutId = setTimeout(() => {
        const present = window.grecaptcha ? 'present' : 'missing';
        finish({ error: 'grecaptcha.ready timed out after ${readyTimeoutMs}ms (grecaptcha ' + present + ')' });
    }, ${readyTimeoutMs});

    const whenReady = () => {
        clearTimeout(timeoutId);
        execute();
    };

    if (window.grecaptcha && typeof window.grecaptcha.execute === 'function') {
        return whenReady();
    }
    if (window.grecaptcha && typeof window.grecaptcha.ready === 'function') {
        return window.grecaptcha.ready(whenReady);
    }

    const poll = setInterval(() => {
        if (resolved) return clearInterval(poll);
        if (!window.grecaptcha) return;
        if (typeof window.grecaptcha.execute === 'function') {
            clearInterval(poll);
            whenReady();
        } else if (typeof window.grecaptcha.ready === 'function') {
            clearInterval(poll);
            window.grecaptcha.ready(whenReady);
        }
    }, 200);
    setTimeout(() => clearInterval(poll), ${readyTimeoutMs});
})`;
}
