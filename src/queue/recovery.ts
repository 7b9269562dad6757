import type { Logger } from "pino";
import { RelayError, isRelayError } from "../errors.js";
import type { AuthProfileRotation } from "../session/authProfiles.js";
import type { SessionController } from "../session/controller.js";
import type { SessionState } from "../session/state.js";

export interface SessionRecoveryOptions {
  controller: SessionController;
  state: SessionState;
  profiles: AuthProfileRotation;
  pageReloadTimeoutMs: number;
  inputWaitTimeoutMs: number;
  /** Model restored after a reconnect. */
  baselineModel: string | null;
}

/**
 * Remediation between attempts. Callers hold the session mutex.
 */
export class SessionRecovery {
  private readonly options: SessionRecoveryOptions;

  public constructor(options: SessionRecoveryOptions) {
    this.options = options;
  }

  /** Tier 1: reload the page and wait for the input. Never throws. */
  public async refreshPage(logger: Logger): Promise<boolean> {
    const { controller } = this.options;
    logger.info({ event: "recovery_tier1_started" }, "recovery_tier1_started");
    try {
      await controller.reloadPage(this.options.pageReloadTimeoutMs);
      await controller.waitForInput(this.options.inputWaitTimeoutMs);
      logger.info({ event: "recovery_tier1_completed" }, "recovery_tier1_completed");
      return true;
    } catch (error) {
      logger.warn(
        { event: "recovery_tier1_failed", message: error instanceof Error ? error.message : String(error) },
        "recovery_tier1_failed",
      );
      return false;
    }
  }

  /**
   * Tier 2: retire the current credential profile, close the session and
   * rebuild it on the next profile from scratch. Throws `recovery_exhausted`
   * when no profile is left and `session_not_ready` when the reconnect fails.
   */
  public async switchAuthProfile(logger: Logger): Promise<string> {
    const { controller, state, profiles } = this.options;
    logger.warn({ event: "recovery_tier2_started", profile: profiles.currentProfile }, "recovery_tier2_started");

    profiles.markFailed();
    const nextProfile = await profiles.next();

    state.ready = false;
    try {
      await controller.close();
      await controller.reconnect(nextProfile);
    } catch (error) {
      if (isRelayError(error)) {
        throw error;
      }
      throw new RelayError("session_not_ready", "Session reconnect failed", {
        profile: nextProfile,
        cause: error instanceof Error ? error.message : String(error),
      });
    }

    await state.modelSwitchMutex.runExclusive(async () => {
      state.currentModelId = null;
      const baseline = this.options.baselineModel;
      if (baseline && (await controller.switchModel(baseline))) {
        state.currentModelId = baseline;
      }
    });
    await state.paramsCacheMutex.runExclusive(async () => {
      state.clearParamsCache();
    });

    state.ready = await controller.isReady();
    logger.info(
      { event: "recovery_tier2_completed", profile: nextProfile, model: state.currentModelId, ready: state.ready },
      "recovery_tier2_completed",
    );
    return nextProfile;
  }
}
