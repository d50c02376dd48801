export interface BrowserLaunchOptions {
    headless: boolean;
    /** Connect to an already running Chrome over CDP instead of spawning one */
    wsEndpoint?: string;
    executablePath?: string;
    args?: string[];
}

export interface ContextOptions {
    userAgent?: string;
    viewport?: { width: number; height: number };
    locale?: string;
    timezoneId?: string;
    blockHeavyResources?: boolean;
}

export type LoadState = 'commit' | 'domcontentloaded' | 'load' | 'networkidle';

/**
 * The slice of a page the challenge solver drives. Scripts are passed as
 * expressions so results cross the page boundary as plain JSON values.
 */
export interface ChallengePage {
    goto(url: string, options: { waitUntil: LoadState; timeout: number }): Promise<void>;
    waitForLoadState(state: 'domcontentloaded' | 'load', timeoutMs: number): Promise<void>;
    evaluate(expression: string): Promise<unknown>;
    waitForFunction(expression: string, timeoutMs: number): Promise<void>;
}

/**
 * One fresh browser context with a single page
 */
export interface BrowserContextHandle {
    readonly page: ChallengePage;
    close(): Promise<void>;
}

export interface ManagedBrowser {
    isConnected(): boolean;
    onDisconnected(listener: () => void): void;
    newContext(options?: ContextOptions): Promise<BrowserContextHandle>;
    close(): Promise<void>;
}

export interface IBrowserAdapter {
    readonly name: string;
    launch(options: BrowserLaunchOptions): Promise<ManagedBrowser>;
}

export type SupervisorState = 'uninitialized' | 'starting' | 'ready' | 'crashed' | 'restarting';

/**
 * A sandboxed context handed to exactly one request.
 * `generation` identifies the browser instance that created it.
 */
export interface IsolatedContext {
    readonly id: string;
    readonly generation: number;
    readonly createdAt: number;
    readonly page: ChallengePage;
}

export interface SupervisorStats {
    state: SupervisorState;
    closed: boolean;
    generation: number;
    launches: number;
    restarts: number;
    activeContexts: number;
    contextsCreated: number;
    contextsDestroyed: number;
    recentFailures: number;
    browserAgeSeconds: number | null;
    lastError: string | null;
}
