import { chromium } from "playwright-core"

import { getErrorMessage, silentLogger, type HarvestLogger } from "../harvest/types.js"
import type { BrowserInteraction, BrowserLauncher, BrowserPage } from "./types.js"

export const DEFAULT_NAVIGATION_TIMEOUT_MS = 60_000
const WAIT_SELECTOR_TIMEOUT_MS = 10_000
const CLICK_TIMEOUT_MS = 10_000
const CLICK_SETTLE_MS = 1_500
const SCROLL_STEPS = 10
const SCROLL_DELTA_PX = 500
const SCROLL_PAUSE_MS = 300

export interface ChromiumLaunchOptions {
  headless: boolean
  executablePath?: string
}

export const createChromiumLauncher =
  (options: ChromiumLaunchOptions): BrowserLauncher =>
  () =>
    chromium.launch({
      headless: options.headless,
      args: ["--no-sandbox"],
      executablePath: options.executablePath,
    })

export interface BrowserFetcherOptions {
  launch: BrowserLauncher
  userAgent: string
  navigationTimeoutMs?: number
  logger?: HarvestLogger
}

/**
 * One browser, one context and one page per fetch. All three are closed once
 * each whether navigation, interaction or the consumer succeeds or throws.
 */
export class BrowserFetcher {
  private readonly navigationTimeoutMs: number
  private readonly logger: HarvestLogger

  constructor(private readonly options: BrowserFetcherOptions) {
    this.navigationTimeoutMs = options.navigationTimeoutMs ?? DEFAULT_NAVIGATION_TIMEOUT_MS
    this.logger = options.logger ?? silentLogger
  }

  async withPage<T>(
    url: string,
    interaction: BrowserInteraction | undefined,
    consume: (page: BrowserPage) => Promise<T>,
  ): Promise<T> {
    const browser = await this.options.launch()
    try {
      const context = await browser.newContext({ userAgent: this.options.userAgent })
      try {
        const page = await context.newPage()
        try {
          await page.goto(url, { timeout: this.navigationTimeoutMs, waitUntil: "domcontentloaded" })
          await this.interact(page, url, interaction ?? {})
          return await consume(page)
        } finally {
          await this.closeLogged("page", url, () => page.close())
        }
      } finally {
        await this.closeLogged("context", url, () => context.close())
      }
    } finally {
      await this.closeLogged("browser", url, () => browser.close())
    }
  }

  fetchHtml(url: string, interaction?: BrowserInteraction): Promise<string> {
    return this.withPage(url, interaction, (page) => page.content())
  }

  private async interact(page: BrowserPage, url: string, interaction: BrowserInteraction): Promise<void> {
    for (const selector of interaction.waitSelectors ?? []) {
      try {
        await page.waitForSelector(selector, { timeout: WAIT_SELECTOR_TIMEOUT_MS })
      } catch (error) {
        this.logger.warn(`Selector ${selector} not found on ${url}: ${getErrorMessage(error)}`)
      }
    }

    for (const selector of interaction.clickSelectors ?? []) {
      try {
        const target = page.locator(selector)
        if (await target.isVisible()) {
          await target.click({ timeout: CLICK_TIMEOUT_MS })
          await page.waitForTimeout(CLICK_SETTLE_MS)
        }
      } catch (error) {
        this.logger.warn(`Could not click ${selector} on ${url}: ${getErrorMessage(error)}`)
      }
    }

    if (interaction.scroll) {
      for (let step = 0; step < SCROLL_STEPS; step++) {
        await page.mouse.wheel(0, SCROLL_DELTA_PX)
        await page.waitForTimeout(SCROLL_PAUSE_MS)
      }
    }
  }

  private async closeLogged(resource: string, url: string, close: () => Promise<void>): Promise<void> {
    try {
      await close()
    } catch (error) {
      this.logger.warn(`Failed to close ${resource} for ${url}: ${getErrorMessage(error)}`)
    }
  }
}
