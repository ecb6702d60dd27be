/**
 * PasswordEstimator: reusable evaluator with cached dictionaries
 *
 * Holds a dictionary snapshot and a translator so repeated evaluations
 * skip loading. Language is per instance; nothing process-wide changes
 * when it is switched.
 */

import type {
  EstimatorConfig,
  EstimatorOptions,
  EvaluationResult,
  FrequencyLists,
  Translate,
  UserInput,
} from "@/types";
import { resolveConfig } from "@/config";
import { loadFrequencyLists } from "@/dictionaries/loader";
import { evaluate } from "@/evaluate";
import { createTranslator } from "@/i18n";
import { SnapshotStore } from "@/snapshot/snapshot";
import * as logger from "@/logger";

export class PasswordEstimator {
  private readonly config: EstimatorConfig;
  private readonly store: SnapshotStore;
  private readonly log = logger.withContext({ component: "PasswordEstimator" });
  private translate: Translate;
  private password = "";
  private result: EvaluationResult;

  /**
   * @param options - Language, user inputs, max length and data directory
   * @param lists - Pre-loaded frequency lists (read from the data directory when omitted)
   */
  constructor(options: EstimatorOptions = {}, lists?: FrequencyLists) {
    this.config = resolveConfig(options);
    this.store = new SnapshotStore(
      lists ?? loadFrequencyLists(this.config.dataDir),
      options.userInputs ?? [],
    );
    this.translate = createTranslator(this.config.language, this.config.dataDir);
    this.result = this.run(this.password);
  }

  private run(password: string): EvaluationResult {
    const result = evaluate(password, this.store.get(), {
      maxLength: this.config.maxLength,
      translate: this.translate,
    });
    this.log.debug("Password evaluated", {
      length: password.length,
      patterns: result.sequence.map((match) => match.pattern),
      score: result.score,
      calcTimeMs: Math.round(result.calcTime * 1000) / 1000,
    });
    return result;
  }

  /**
   * Evaluates a new password. On LengthExceededError the previous
   * password and result are kept.
   *
   * @throws {LengthExceededError}
   */
  setPassword(password: string): EvaluationResult {
    this.result = this.run(password);
    this.password = password;
    return this.result;
  }

  getPassword(): string {
    return this.password;
  }

  getResult(): EvaluationResult {
    return this.result;
  }

  getLanguage(): string {
    return this.config.language;
  }

  getTranslator(): Translate {
    return this.translate;
  }

  /**
   * Replaces the caller word list, republishes the snapshot and
   * re-evaluates the current password.
   */
  updateUserInputs(userInputs: readonly UserInput[]): EvaluationResult {
    this.store.update(userInputs);
    this.result = this.run(this.password);
    return this.result;
  }

  /**
   * Switches the feedback language and re-evaluates the current password.
   */
  setLanguage(language: string): EvaluationResult {
    this.translate = createTranslator(language, this.config.dataDir);
    this.config.language = language;
    this.log.debug("Language changed", { language });
    this.result = this.run(this.password);
    return this.result;
  }

  /**
   * Summary line without the password itself.
   *
   * @example
   * String(estimator) // "PasswordEstimator(score=1, guesses=1e+4)"
   */
  toString(): string {
    const { score, guesses } = this.result;
    return `PasswordEstimator(score=${score}, guesses=${guesses.toExponential()})`;
  }
}
