/**
 * The slice of a browser the pipeline relies on. Anything beyond these calls
 * stays inside the adapter.
 */
export interface PageHandle<TElement = unknown> {
  url(): string;
  evaluate(script: string): Promise<unknown>;
  queryAll(selector: string): Promise<TElement[]>;
  getAttribute(el: TElement, name: string): Promise<string | null>;
  textContent(el: TElement): Promise<string>;
  content(): Promise<string>;
}

export interface BrowserSession<TElement = unknown> {
  navigate(url: string, timeoutMs: number): Promise<PageHandle<TElement>>;
  close(): Promise<void>;
}

export type SessionFactory<TElement = unknown> = () => Promise<BrowserSession<TElement>>;
