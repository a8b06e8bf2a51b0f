import { writeFile } from "node:fs/promises";
import { join } from "node:path";

export interface RemoteImageOptions {
  url: string;
  title?: string;
  cookies?: Record<string, string>;
  /** Ask the image host for the full-resolution rendition. */
  fullSize?: boolean;
}

export function cookieHeader(cookies: Record<string, string>): string {
  return Object.entries(cookies)
    .map(([name, value]) => `${name}=${value}`)
    .join("; ");
}

/**
 * An image reachable over HTTP with the caller's session cookies,
 * e.g. a generated picture that the upstream only serves to its owner.
 */
export class RemoteImage {
  readonly url: string;
  readonly title: string;
  private readonly cookies: Record<string, string>;
  private readonly fullSize: boolean;

  constructor(options: RemoteImageOptions) {
    this.url = options.url;
    this.title = options.title ?? "[Image]";
    this.cookies = options.cookies ?? {};
    this.fullSize = options.fullSize ?? true;
  }

  /** Downloads the image into `dir` and returns the written path. */
  async save(dir: string, filename: string): Promise<string> {
    const target = this.fullSize ? `${this.url}=s2048` : this.url;
    const headers: Record<string, string> = {};
    if (Object.keys(this.cookies).length > 0) {
      headers.Cookie = cookieHeader(this.cookies);
    }

    const response = await fetch(target, { headers, redirect: "follow" });
    if (!response.ok) {
      throw new Error(`Image request failed (${response.status}): ${this.url}`);
    }

    const contentType = response.headers.get("content-type") ?? "";
    if (!contentType.startsWith("image")) {
      throw new Error(`Unexpected content type "${contentType}" for ${this.url}`);
    }

    const path = join(dir, filename);
    await writeFile(path, new Uint8Array(await response.arrayBuffer()));
    return path;
  }
}
