/**
 * Spinner - Progress spinner for interactive runs
 */

import ora, { type Ora } from 'ora';

/**
 * Spinner configuration options
 */
export interface SpinnerOptions {
  /** Spinner text */
  text?: string;
  /** Whether to show the spinner (false when not interactive or in CI) */
  enabled?: boolean;
}

/**
 * Spinner wrapper for consistent CLI feedback
 */
export class Spinner {
  private spinner: Ora;

  constructor(options: SpinnerOptions = {}) {
    const enabled = options.enabled ?? (Boolean(process.stderr.isTTY) && !process.env['CI']);
    this.spinner = ora({ color: 'cyan', isEnabled: enabled, text: options.text ?? '' });
  }

  start(text?: string): this {
    if (text) {
      this.spinner.text = text;
    }
    this.spinner.start();
    return this;
  }

  stop(): this {
    this.spinner.stop();
    return this;
  }

  /**
   * Update the spinner text
   */
  text(text: string): this {
    this.spinner.text = text;
    return this;
  }
}

export function createSpinner(textOrOptions?: string | SpinnerOptions): Spinner {
  if (typeof textOrOptions === 'string') {
    return new Spinner({ text: textOrOptions });
  }
  return new Spinner(textOrOptions);
}
