import { chromium, type Browser } from "playwright-core";
import { DEFAULT_USER_AGENT } from "./constants";
import { log } from "./helpers/log.helper";

/**
 * Renders pages in a shared headless Chromium. The browser is launched on
 * first use and kept until close().
 */
export class BrowserRenderer {
  private browser: Promise<Browser> | null = null;

  constructor(private readonly userAgent = DEFAULT_USER_AGENT) {}

  private launch(): Promise<Browser> {
    if (!this.browser) {
      log.info("Launching headless Chromium for proxied pages");
      this.browser = chromium.launch({ headless: true }).catch((err: unknown) => {
        this.browser = null;
        throw err;
      });
    }
    return this.browser;
  }

  async render(url: string): Promise<string> {
    const browser = await this.launch();
    const page = await browser.newPage({ userAgent: this.userAgent });
    try {
      await page.goto(url, { waitUntil: "domcontentloaded", timeout: 60000 });
      return await page.content();
    } finally {
      await page.close();
    }
  }

  async close(): Promise<void> {
    if (!this.browser) return;
    const pending = this.browser;
    this.browser = null;
    const browser = await pending;
    await browser.close();
  }
}
