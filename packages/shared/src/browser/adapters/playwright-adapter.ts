import { chromium } from 'playwright';
import type { Browser, BrowserContext, Page, Route } from 'playwright';
import type {
    BrowserContextHandle,
    BrowserLaunchOptions,
    ChallengePage,
    ContextOptions,
    IBrowserAdapter,
    ManagedBrowser,
} from '../../types/browser.interface.js';
import { decideRoute } from '../request-filter.js';
import logger from '../../utils/logger.js';

const log = logger.child({ component: 'playwright-adapter' });

export const BROWSER_ARGS = [
    '--disable-blink-features=AutomationControlled',
    '--disable-dev-shm-usage',
    '--no-sandbox',
    '--disable-setuid-sandbox'
];

export const DEFAULT_CONTEXT_OPTIONS: Required<Omit<ContextOptions, 'blockHeavyResources'>> = {
    viewport: { width: 1920, height: 1080 },
    userAgent: 'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
    locale: 'en-US',
    timezoneId: 'America/New_York'
};

function toChallengePage(page: Page): ChallengePage {
    return {
        async goto(url, options) {
            await page.goto(url, options);
        },
        async waitForLoadState(state, timeoutMs) {
            await page.waitForLoadState(state, { timeout: timeoutMs });
        },
        evaluate(expression) {
            return page.evaluate(expression);
        },
        async waitForFunction(expression, timeoutMs) {
            await page.waitForFunction(expression, undefined, { timeout: timeoutMs });
        }
    };
}

async function handleRoute(route: Route): Promise<void> {
    const request = route.request();
    const decision = decideRoute(request.url(), request.resourceType());
    try {
        if (decision === 'abort') {
            await route.abort();
        } else {
            await route.continue();
        }
    } catch (error) {
        // The context may already be closing
        log.debug({ err: error, url: request.url() }, 'Route handling skipped');
    }
}

class PlaywrightBrowser implements ManagedBrowser {
    constructor(private readonly browser: Browser) { }

    isConnected(): boolean {
        return this.browser.isConnected();
    }

    onDisconnected(listener: () => void): void {
        this.browser.on('disconnected', () => listener());
    }

    async newContext(options: ContextOptions = {}): Promise<BrowserContextHandle> {
        const context: BrowserContext = await this.browser.newContext({
            viewport: options.viewport ?? DEFAULT_CONTEXT_OPTIONS.viewport,
            userAgent: options.userAgent ?? DEFAULT_CONTEXT_OPTIONS.userAgent,
            locale: options.locale ?? DEFAULT_CONTEXT_OPTIONS.locale,
            timezoneId: options.timezoneId ?? DEFAULT_CONTEXT_OPTIONS.timezoneId
        });

        try {
            if (options.blockHeavyResources) {
                await context.route('**/*', handleRoute);
            }
            const page = await context.newPage();
            return {
                page: toChallengePage(page),
                close: () => context.close()
            };
        } catch (error) {
            await context.close().catch((closeError: unknown) =>
                log.warn({ err: closeError }, 'Failed to close half-built context')
            );
            throw error;
        }
    }

    async close(): Promise<void> {
        await this.browser.close();
    }
}

export class PlaywrightAdapter implements IBrowserAdapter {
    readonly name = 'playwright';

    async launch(options: BrowserLaunchOptions): Promise<ManagedBrowser> {
        if (options.wsEndpoint) {
            // Remote Chrome (e.g. browserless) speaks CDP, not the Playwright server protocol
            log.info('Connecting to remote browser over CDP');
            const remote = await chromium.connectOverCDP(options.wsEndpoint);
            return new PlaywrightBrowser(remote);
        }

        const browser = await chromium.launch({
            headless: options.headless,
            args: [...BROWSER_ARGS, ...(options.args ?? [])],
            executablePath: options.executablePath
        });

        return new PlaywrightBrowser(browser);
    }
}
