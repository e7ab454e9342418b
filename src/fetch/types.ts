// Structural slice of the browser automation API used by the fetch layer and
// interactive adapters. playwright-core's Browser/BrowserContext/Page satisfy it.

export interface BrowserLocator {
  isVisible(): Promise<boolean>
  click(options?: { timeout?: number }): Promise<void>
}

export interface BrowserPage {
  goto(url: string, options: { timeout: number; waitUntil: "domcontentloaded" }): Promise<unknown>
  waitForSelector(selector: string, options: { timeout: number }): Promise<unknown>
  locator(selector: string): BrowserLocator
  readonly mouse: { wheel(deltaX: number, deltaY: number): Promise<void> }
  waitForTimeout(timeout: number): Promise<void>
  content(): Promise<string>
  close(): Promise<void>
}

export interface BrowserSessionContext {
  newPage(): Promise<BrowserPage>
  close(): Promise<void>
}

export interface BrowserInstance {
  newContext(options: { userAgent: string }): Promise<BrowserSessionContext>
  close(): Promise<void>
}

export type BrowserLauncher = () => Promise<BrowserInstance>

/** Steps run on the page after navigation and before extraction. */
export interface BrowserInteraction {
  waitSelectors?: readonly string[]
  clickSelectors?: readonly string[]
  scroll?: boolean
}

export type LightweightFetchResult =
  | { success: true; url: string; html: string }
  | { success: false; url: string; error: string }
