/**
 * SafeHTML - Wrapper for HTML content that has already been sanitized
 *
 * `innerHTML` / `outerHTML` properties are sanitized by the DOM renderer
 * before they reach the host. A SafeHTML value is passed through as is, so
 * HTML that was sanitized once (or is trusted static markup) is not
 * sanitized again on every patch.
 *
 * This module has no browser dependencies; the node model and the virtual
 * renderer can use it outside a DOM.
 *
 * @example
 * import DOMPurify from 'dompurify';
 * SafeHTML.configureSanitizer(DOMPurify);
 *
 * property('innerHTML', SafeHTML.sanitize(userInput));
 *
 * // For static trusted strings (use with extreme caution)
 * property('innerHTML', SafeHTML.unsafe(iconMarkup));
 */

import { isDev } from './symbols.js';

/** DOMPurify or anything with a compatible `sanitize` */
export interface HTMLSanitizer {
  sanitize(html: string): string;
}

/** Instances created by this module; guards against look-alike objects */
const instances = new WeakSet<object>();

export class SafeHTML {
  /** Configured sanitizer (DOMPurify or compatible) */
  private static sanitizer: HTMLSanitizer | null = null;

  private constructor(private readonly html: string) {
    instances.add(this);
    Object.freeze(this);
  }

  /**
   * Configure the sanitizer used by `SafeHTML.sanitize`.
   */
  static configureSanitizer(sanitizer: HTMLSanitizer): void {
    if (typeof sanitizer?.sanitize !== 'function') {
      throw new TypeError(
        'treepatch: SafeHTML.configureSanitizer() requires a sanitizer with a .sanitize() method.\n' +
        'Example:\n' +
        "  import DOMPurify from 'dompurify';\n" +
        '  SafeHTML.configureSanitizer(DOMPurify);'
      );
    }
    SafeHTML.sanitizer = sanitizer;
  }

  static hasSanitizer(): boolean {
    return SafeHTML.sanitizer !== null;
  }

  /** @internal Drop the configured sanitizer */
  static resetSanitizer(): void {
    SafeHTML.sanitizer = null;
  }

  /**
   * Sanitize HTML content and wrap it.
   * @throws TypeError if no sanitizer is configured
   */
  static sanitize(html: string): SafeHTML {
    if (!SafeHTML.sanitizer) {
      throw new TypeError(
        'treepatch: SafeHTML.sanitize() requires a sanitizer.\n' +
        'Call SafeHTML.configureSanitizer(DOMPurify) first.'
      );
    }
    return new SafeHTML(SafeHTML.sanitizer.sanitize(String(html)));
  }

  /**
   * Wrap a trusted static string WITHOUT sanitization.
   * Never use with user-provided content.
   */
  static unsafe(html: string): SafeHTML {
    if (isDev()) {
      console.warn(
        'treepatch: SafeHTML.unsafe() bypasses sanitization.\n' +
        'Only use it for static, trusted HTML that you control.'
      );
    }
    return new SafeHTML(String(html));
  }

  static empty(): SafeHTML {
    return new SafeHTML('');
  }

  static isSafeHTML(value: unknown): value is SafeHTML {
    return typeof value === 'object' && value !== null && instances.has(value);
  }

  toString(): string {
    return this.html;
  }

  toJSON(): string {
    return this.html;
  }
}
