/**
 * Base error for page-level operations
 */
export class PageError extends Error {
  constructor(message: string, cause?: Error) {
    super(message, cause ? { cause } : undefined);
    this.name = "PageError";
  }
}

/**
 * Raised when a page method is called with input it cannot forward
 */
export class PageInputError extends PageError {
  constructor(message: string) {
    super(message);
    this.name = "PageInputError";
  }
}

export class WebViewNotFoundError extends PageError {
  constructor(message: string = "No WebView found.") {
    super(message);
    this.name = "WebViewNotFoundError";
  }
}

/**
 * Raised when a WebDriver/Appium session cannot be opened
 */
export class SessionError extends PageError {
  constructor(message: string, cause?: Error) {
    super(message, cause);
    this.name = "SessionError";
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
