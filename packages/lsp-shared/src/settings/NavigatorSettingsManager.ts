/*
 * Copyright (c) 2025, salesforce.com, inc.
 * All rights reserved.
 * Licensed under the BSD 3-Clause license.
 * For full license text, see LICENSE.txt file in the
 * repo root or https://opensource.org/licenses/BSD-3-Clause
 */

import { getLogger, setLogLevel } from '../logger';
import { formattedError } from '../utils/ErrorUtils';
import type {
  DefinitionSettings,
  SymbolNavigatorSettings,
} from './SymbolNavigatorSettings';
import {
  mergeWithDefaults,
  mergeWithExisting,
  parseNavigatorSettings,
} from './NavigatorSettingsUtilities';

/**
 * Event listener for settings changes
 */
export type SettingsChangeListener = (
  settings: SymbolNavigatorSettings,
) => void;

/**
 * Settings manager for the Symbol Navigator
 * Handles settings lifecycle, validation, and change notifications
 */
export class NavigatorSettingsManager {
  private static instance: NavigatorSettingsManager | null = null;
  private currentSettings: SymbolNavigatorSettings;
  private changeListeners: SettingsChangeListener[] = [];
  private readonly logger = getLogger();

  private constructor(initialSettings: unknown = {}) {
    const parsed = parseNavigatorSettings(initialSettings);
    if (!parsed.success) {
      this.logger.warn(
        () =>
          `Ignoring invalid initial navigator settings: ${parsed.details.join('; ')}`,
      );
    }
    this.currentSettings = mergeWithDefaults(
      parsed.success ? parsed.settings : {},
    );
    if (this.currentSettings.navigator.logLevel) {
      setLogLevel(this.currentSettings.navigator.logLevel);
    }
    this.logger.debug(
      () =>
        `Initial settings: ${JSON.stringify(this.currentSettings, null, 2)}`,
    );
  }

  /**
   * @param initialSettings Host settings used when the instance is first
   * created; validated like any update, and replaced by the defaults when
   * invalid
   */
  public static getInstance(
    initialSettings?: unknown,
  ): NavigatorSettingsManager {
    if (!NavigatorSettingsManager.instance) {
      NavigatorSettingsManager.instance = new NavigatorSettingsManager(
        initialSettings,
      );
    }
    return NavigatorSettingsManager.instance;
  }

  /**
   * Reset the singleton instance (useful for testing)
   */
  public static resetInstance(): void {
    NavigatorSettingsManager.instance = null;
  }

  public getSettings(): SymbolNavigatorSettings {
    return mergeWithExisting(this.currentSettings, {});
  }

  public getDefinitionSettings(): DefinitionSettings {
    return this.getSettings().navigator.definition;
  }

  /**
   * Validate and apply a settings update (typically from a host
   * configuration change).
   * @returns False when the update was rejected
   */
  public updateSettings(update: unknown): boolean {
    const parsed = parseNavigatorSettings(update);
    if (!parsed.success) {
      this.logger.warn(
        () =>
          `Ignoring invalid navigator settings: ${parsed.details.join('; ')}`,
      );
      return false;
    }

    const accepted = parsed.settings;
    const logLevel = accepted.navigator?.logLevel;
    if (logLevel) {
      setLogLevel(logLevel);
    }

    this.currentSettings = mergeWithExisting(this.currentSettings, accepted);
    this.logger.debug(
      () => `Navigator settings updated: ${JSON.stringify(accepted)}`,
    );
    this.notifyListeners(this.currentSettings);
    return true;
  }

  /**
   * Register a settings change listener
   * @returns Function that removes the listener
   */
  public onSettingsChange(listener: SettingsChangeListener): () => void {
    this.changeListeners.push(listener);
    return () => {
      this.changeListeners = this.changeListeners.filter(
        (registered) => registered !== listener,
      );
    };
  }

  private notifyListeners(settings: SymbolNavigatorSettings): void {
    for (const listener of this.changeListeners) {
      try {
        listener(mergeWithExisting(settings, {}));
      } catch (error) {
        this.logger.error(() =>
          formattedError(error, {
            context: 'settings change listener',
            includeStack: false,
          }),
        );
      }
    }
  }
}
