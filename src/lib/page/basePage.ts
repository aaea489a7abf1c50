import type { PageDriver } from "./driver.js";
import { PageInputError } from "./errors.js";

export interface BasePageOptions {
  /** Base URL that relative paths given to `open()` resolve against */
  url?: string;
}

/**
 * Owns the driver handle that every page helper forwards to
 */
export class BasePage {
  protected readonly baseUrl: string | undefined;

  constructor(
    protected readonly pageDriver: PageDriver,
    options: BasePageOptions = {}
  ) {
    this.baseUrl = options.url;
  }

  get driver(): PageDriver {
    return this.pageDriver;
  }

  async open(uri?: string): Promise<string> {
    const target = this.resolveUrl(uri);
    await this.pageDriver.url(target);
    console.log(`Opened ${target}`);
    return target;
  }

  static sleep(seconds: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, seconds * 1000));
  }

  private resolveUrl(uri?: string): string {
    if (uri && isAbsoluteUrl(uri)) {
      return uri;
    }
    if (!this.baseUrl) {
      throw new PageInputError(
        uri ? `Cannot resolve relative URL '${uri}' without a base URL` : "No URL to open"
      );
    }
    return uri ? new URL(asRelativeReference(uri), this.baseUrl).toString() : this.baseUrl;
  }
}

function isAbsoluteUrl(uri: string): boolean {
  return /^[a-z][a-z0-9+.-]*:\/\//i.test(uri) || /^(about|data):/i.test(uri);
}

// `host:port/path` would otherwise parse as a URL with scheme `host`
function asRelativeReference(uri: string): string {
  return /^[/.?#]/.test(uri) ? uri : `./${uri}`;
}
