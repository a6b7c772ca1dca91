/**
 * The subset of a live browser page the extractors depend on. Locators are CSS selectors.
 */
export interface PageSource {
  currentUrl(): string;
  content(): Promise<string>;
  goto(url: string, timeoutMs: number): Promise<void>;
  click(locator: string): Promise<void>;
  selectOption(locator: string, value: string): Promise<void>;
  /** Resolves false when the element is not clickable within the timeout. */
  waitForClickable(locator: string, timeoutMs: number): Promise<boolean>;
}

/**
 * Scoped acquisition of a page: the page is released when `use` settles, whatever the outcome.
 */
export type PageSession = <T>(use: (page: PageSource) => Promise<T>) => Promise<T>;
