import { readFile } from "node:fs/promises";
import puppeteer, { TimeoutError, type Browser, type CookieParam, type Page } from "puppeteer-core";
import type { Logger } from "pino";
import { z } from "zod";
import type { SessionSelectors } from "../config.js";
import { RelayError, isRelayError } from "../errors.js";
import type { SamplingParameters } from "../pipeline/request.js";
import type { Mutex } from "../utils/mutex.js";
import { sleep } from "../utils/time.js";
import type { FinalContent, ParamsCache, SessionController } from "./controller.js";

export interface BrowserSessionOptions {
  wsEndpoint: string;
  targetUrl: string;
  selectors: SessionSelectors;
  modelPreferenceKey: string;
  navigationTimeoutMs: number;
  responseTimeoutMs: number;
  responsePollMs: number;
  responseStableChecks: number;
  logger: Logger;
}

const profileSchema = z.object({
  cookies: z
    .array(
      z.object({
        name: z.string(),
        value: z.string(),
        domain: z.string().optional(),
        path: z.string().optional(),
        expires: z.number().optional(),
        httpOnly: z.boolean().optional(),
        secure: z.boolean().optional(),
        sameSite: z.enum(["Strict", "Lax", "None"]).optional().catch(undefined),
      }),
    )
    .default([]),
  origins: z
    .array(
      z.object({
        origin: z.string(),
        localStorage: z.array(z.object({ name: z.string(), value: z.string() })).default([]),
      }),
    )
    .default([]),
});

export type AuthProfile = z.infer<typeof profileSchema>;

/** Reads a saved browser storage state (cookies plus per-origin localStorage). */
export async function loadAuthProfile(profilePath: string): Promise<AuthProfile> {
  let raw: string;
  try {
    raw = await readFile(profilePath, "utf8");
  } catch (error) {
    throw new RelayError("session_not_ready", "Auth profile could not be read", {
      profile: profilePath,
      cause: error instanceof Error ? error.message : String(error),
    });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new RelayError("session_not_ready", "Auth profile is not valid JSON", { profile: profilePath });
  }

  const result = profileSchema.safeParse(parsed);
  if (!result.success) {
    throw new RelayError("session_not_ready", "Auth profile has an unexpected shape", {
      profile: profilePath,
      issues: result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    });
  }
  return result.data;
}

export function toCookieParams(profile: AuthProfile): CookieParam[] {
  return profile.cookies.map((cookie) => ({
    name: cookie.name,
    value: cookie.value,
    domain: cookie.domain,
    path: cookie.path,
    httpOnly: cookie.httpOnly,
    secure: cookie.secure,
    sameSite: cookie.sameSite,
    // Session cookies are stored with a negative expiry.
    expires: cookie.expires !== undefined && cookie.expires > 0 ? cookie.expires : undefined,
  }));
}

const preferencesSchema = z.record(z.unknown());

export function parsePreferences(raw: string | null): Record<string, unknown> {
  if (!raw) {
    return {};
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return {};
  }
  const result = preferencesSchema.safeParse(parsed);
  return result.success ? result.data : {};
}

export function modelPath(modelId: string): string {
  return `models/${modelId}`;
}

const PARAMETER_KEYS = ["temperature", "maxOutputTokens", "topP", "stop", "reasoningEffort"] as const satisfies ReadonlyArray<
  keyof SamplingParameters
>;

function sameValue(left: unknown, right: unknown): boolean {
  return JSON.stringify(left) === JSON.stringify(right);
}

function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw signal.reason;
  }
}

interface ResponseSnapshot {
  count: number;
  text: string;
}

/**
 * Drives the chat page of an already running browser over the DevTools
 * protocol. Callers hold the session mutex.
 */
export class BrowserSessionController implements SessionController {
  private readonly options: BrowserSessionOptions;
  private browser: Browser | null = null;
  private page: Page | null = null;
  private baseline: ResponseSnapshot = { count: 0, text: "" };

  public constructor(options: BrowserSessionOptions) {
    this.options = options;
  }

  public async connect(profilePath?: string): Promise<void> {
    const { logger } = this.options;
    if (!this.options.wsEndpoint) {
      throw new RelayError("session_not_ready", "BROWSER_WS_ENDPOINT is not configured");
    }

    const browser = await this.guard("connect", () =>
      puppeteer.connect({ browserWSEndpoint: this.options.wsEndpoint, defaultViewport: null }),
    );
    browser.on("disconnected", () => {
      logger.warn({ event: "browser_disconnected" }, "browser_disconnected");
      if (this.browser === browser) {
        this.browser = null;
        this.page = null;
      }
    });
    this.browser = browser;

    const pages = await browser.pages();
    const existing = pages.find((candidate) => candidate.url().startsWith(this.options.targetUrl));
    this.page = existing ?? (await browser.newPage());

    if (profilePath) {
      await this.clearCookies();
      await this.applyProfile(profilePath);
    }
    await this.openChat();
    await this.waitForInput(this.options.navigationTimeoutMs);
    logger.info({ event: "browser_session_connected", profile: profilePath ?? null }, "browser_session_connected");
  }

  public async isReady(): Promise<boolean> {
    const page = this.page;
    if (!page || page.isClosed() || !this.browser?.connected) {
      return false;
    }
    try {
      return (await page.$(this.options.selectors.input)) !== null;
    } catch (error) {
      this.options.logger.debug(
        { event: "session_ready_check_failed", message: error instanceof Error ? error.message : String(error) },
        "session_ready_check_failed",
      );
      return false;
    }
  }

  public async submit(prompt: string, attachments: string[], signal?: AbortSignal): Promise<void> {
    const page = this.requirePage();
    const { selectors } = this.options;
    throwIfAborted(signal);

    this.baseline = await this.readResponse(page);
    if (attachments.length > 0) {
      await this.attachFiles(page, attachments);
    }

    const filled = await this.guard("fill_prompt", () =>
      page.$eval(
        selectors.input,
        (element, text) => {
          if (!(element instanceof HTMLTextAreaElement) && !(element instanceof HTMLInputElement)) {
            return false;
          }
          element.value = text;
          element.dispatchEvent(new Event("input", { bubbles: true }));
          return true;
        },
        prompt,
      ),
    );
    if (!filled) {
      throw new RelayError("upstream_error", "Prompt input is not a text field", { selector: selectors.input });
    }

    throwIfAborted(signal);
    await this.guard("click_submit", () => page.click(selectors.submit));
  }

  public async switchModel(modelId: string, signal?: AbortSignal): Promise<boolean> {
    const page = this.requirePage();
    const { logger, modelPreferenceKey } = this.options;
    const target = modelPath(modelId);

    const original = await page.evaluate((key) => localStorage.getItem(key), modelPreferenceKey);
    const preferences = parsePreferences(original);
    if (preferences.promptModel === target) {
      return true;
    }

    await this.writePreferences(page, JSON.stringify({ ...preferences, promptModel: target }));
    await this.openChat();
    throwIfAborted(signal);

    const stored = parsePreferences(await page.evaluate((key) => localStorage.getItem(key), modelPreferenceKey));
    if (stored.promptModel === target) {
      logger.info({ event: "browser_model_switched", model: modelId }, "browser_model_switched");
      return true;
    }

    logger.warn(
      { event: "browser_model_switch_rejected", expected: target, actual: stored.promptModel ?? null },
      "browser_model_switch_rejected",
    );
    if (original !== null) {
      await this.writePreferences(page, original);
      await this.openChat();
    }
    return false;
  }

  public async adjustParameters(
    params: SamplingParameters,
    cache: ParamsCache,
    cacheMutex: Mutex,
    signal?: AbortSignal,
  ): Promise<void> {
    const page = this.requirePage();
    await cacheMutex.runExclusive(async () => {
      for (const key of PARAMETER_KEYS) {
        const value = params[key];
        if (value === undefined || sameValue(cache.values[key], value)) {
          continue;
        }
        throwIfAborted(signal);

        const selector = this.parameterSelector(key);
        if (selector && typeof value === "number") {
          const written = await this.writeNumberInput(page, selector, value);
          if (!written) {
            this.options.logger.warn({ event: "parameter_not_applied", parameter: key, value }, "parameter_not_applied");
            continue;
          }
        }
        cache.values[key] = value;
        this.options.logger.debug({ event: "parameter_applied", parameter: key, value }, "parameter_applied");
      }
    });
  }

  public async awaitFinalContent(signal?: AbortSignal): Promise<FinalContent> {
    const page = this.requirePage();
    const { responsePollMs, responseStableChecks, responseTimeoutMs } = this.options;
    const deadline = Date.now() + responseTimeoutMs;
    let last: string | null = null;
    let stablePolls = 0;

    while (Date.now() < deadline) {
      await sleep(responsePollMs, signal);
      const snapshot = await this.readResponse(page);
      const isNew = snapshot.count > this.baseline.count || (snapshot.count > 0 && snapshot.text !== this.baseline.text);
      if (!isNew) {
        continue;
      }

      if (snapshot.text === last) {
        stablePolls += 1;
      } else {
        last = snapshot.text;
        stablePolls = 0;
      }

      // An empty turn has to stay empty twice as long before it counts as final.
      const required = snapshot.text.length > 0 ? responseStableChecks : responseStableChecks * 2;
      if (stablePolls >= required) {
        return { content: snapshot.text, reasoning: await this.readThinking(page) };
      }
    }

    throw new RelayError("internal_timeout", "Response did not settle before the deadline", {
      timeoutMs: responseTimeoutMs,
    });
  }

  public async clearHistory(): Promise<void> {
    const page = this.requirePage();
    const { selectors, logger } = this.options;
    await this.guard("clear_chat", () => page.click(selectors.clearChat));

    try {
      const confirm = await page.waitForSelector(selectors.clearChatConfirm, { visible: true, timeout: 2_000 });
      await confirm?.click();
    } catch (error) {
      if (!(error instanceof TimeoutError)) {
        throw error;
      }
      logger.debug({ event: "clear_chat_no_confirm" }, "clear_chat_no_confirm");
    }

    await this.waitForInput(this.options.navigationTimeoutMs);
    this.baseline = { count: 0, text: "" };
  }

  public async reloadPage(timeoutMs: number): Promise<void> {
    const page = this.requirePage();
    await this.guard("reload", () => page.reload({ waitUntil: "domcontentloaded", timeout: timeoutMs }));
  }

  public async waitForInput(timeoutMs: number): Promise<void> {
    const page = this.requirePage();
    await this.guard("wait_for_input", () =>
      page.waitForSelector(this.options.selectors.input, { visible: true, timeout: timeoutMs }),
    );
  }

  /**
   * Tears the page and the DevTools connection down, then connects from
   * scratch on `profilePath`.
   */
  public async reconnect(profilePath: string): Promise<void> {
    await this.close();
    await this.connect(profilePath);
    this.baseline = { count: 0, text: "" };
    this.options.logger.info({ event: "browser_session_reconnected", profile: profilePath }, "browser_session_reconnected");
  }

  public async close(): Promise<void> {
    const browser = this.browser;
    const page = this.page;
    this.browser = null;
    this.page = null;

    if (page && !page.isClosed()) {
      try {
        await page.close();
      } catch (error) {
        this.options.logger.warn(
          { event: "page_close_failed", message: error instanceof Error ? error.message : String(error) },
          "page_close_failed",
        );
      }
    }
    if (browser?.connected) {
      // The browser belongs to whoever launched it; only detach.
      await browser.disconnect();
    }
  }

  private requirePage(): Page {
    if (!this.page || this.page.isClosed()) {
      throw new RelayError("upstream_error", "Browser page is not available");
    }
    return this.page;
  }

  private async openChat(): Promise<void> {
    const page = this.requirePage();
    await this.guard("navigate", () =>
      page.goto(this.options.targetUrl, { waitUntil: "domcontentloaded", timeout: this.options.navigationTimeoutMs }),
    );
  }

  /** The browser outlives our connections, so a previous profile's cookies are still there. */
  private async clearCookies(): Promise<void> {
    const session = await this.requirePage().createCDPSession();
    try {
      await session.send("Network.clearBrowserCookies");
    } finally {
      await session.detach();
    }
  }

  private async applyProfile(profilePath: string): Promise<void> {
    const page = this.requirePage();
    const profile = await loadAuthProfile(profilePath);
    const cookies = toCookieParams(profile);
    if (cookies.length > 0) {
      await page.setCookie(...cookies);
    }

    const target = new URL(this.options.targetUrl).origin;
    const storage = profile.origins.find((entry) => entry.origin === target)?.localStorage ?? [];
    if (storage.length > 0) {
      await this.openChat();
      await page.evaluate((entries) => {
        for (const entry of entries) {
          localStorage.setItem(entry.name, entry.value);
        }
      }, storage);
    }
    this.options.logger.info(
      { event: "auth_profile_applied", profile: profilePath, cookies: cookies.length, storageEntries: storage.length },
      "auth_profile_applied",
    );
  }

  private async writePreferences(page: Page, value: string): Promise<void> {
    await page.evaluate(
      (key, serialized) => localStorage.setItem(key, serialized),
      this.options.modelPreferenceKey,
      value,
    );
  }

  private parameterSelector(key: (typeof PARAMETER_KEYS)[number]): string | null {
    const { selectors } = this.options;
    switch (key) {
      case "temperature":
        return selectors.temperature;
      case "maxOutputTokens":
        return selectors.maxOutputTokens;
      case "topP":
        return selectors.topP;
      default:
        return null;
    }
  }

  private async writeNumberInput(page: Page, selector: string, value: number): Promise<boolean> {
    try {
      return await page.$eval(
        selector,
        (element, next) => {
          if (!(element instanceof HTMLInputElement)) {
            return false;
          }
          element.value = String(next);
          element.dispatchEvent(new Event("input", { bubbles: true }));
          element.dispatchEvent(new Event("change", { bubbles: true }));
          return true;
        },
        value,
      );
    } catch (error) {
      this.options.logger.debug(
        { event: "parameter_input_missing", selector, message: error instanceof Error ? error.message : String(error) },
        "parameter_input_missing",
      );
      return false;
    }
  }

  private async attachFiles(page: Page, paths: string[]): Promise<void> {
    const [fileChooser] = await this.guard("open_file_chooser", () =>
      Promise.all([
        page.waitForFileChooser({ timeout: this.options.navigationTimeoutMs }),
        page.click(this.options.selectors.attach),
      ]),
    );
    await fileChooser.accept(paths);
    this.options.logger.info({ event: "attachments_uploaded", count: paths.length }, "attachments_uploaded");
  }

  private async readResponse(page: Page): Promise<ResponseSnapshot> {
    const texts = await page.$$eval(this.options.selectors.response, (elements) =>
      elements.map((element) => (element.textContent ?? "").trim()),
    );
    return { count: texts.length, text: texts[texts.length - 1] ?? "" };
  }

  private async readThinking(page: Page): Promise<string> {
    const texts = await page.$$eval(this.options.selectors.thinking, (elements) =>
      elements.map((element) => (element.textContent ?? "").trim()),
    );
    return texts.filter((text) => text.length > 0).join("\n");
  }

  /**
   * Page timeouts surface as `internal_timeout`; the driver's own message
   * is dropped since it mentions "exceeded".
   */
  private async guard<T>(action: string, run: () => Promise<T>): Promise<T> {
    try {
      return await run();
    } catch (error) {
      if (isRelayError(error)) {
        throw error;
      }
      if (error instanceof TimeoutError) {
        throw new RelayError("internal_timeout", `Browser action timed out: ${action}`, { action });
      }
      throw new RelayError("upstream_error", `Browser action failed: ${action}`, {
        action,
        cause: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
