// Text matching helpers

export class TextUtils {
  /**
   * Case-insensitive substring test. An absent text never matches.
   */
  static containsIgnoreCase(text: string | undefined, fragment: string): boolean {
    if (!text) return false;
    return text.toLowerCase().includes(fragment.toLowerCase());
  }
}
