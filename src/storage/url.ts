import type { ContainerHandle } from "./remote.js";

/** Serve over SSL always, never, or decided per record at URL time. */
export type SslOption<R> = boolean | ((record: R) => boolean);

export function resolveSsl<R>(option: SslOption<R> | undefined, record: R): boolean {
  if (typeof option === "function") return option(record);
  return option === true;
}

/**
 * Base URL objects in the container are served from. A CNAME from the
 * credentials replaces both the plain and the SSL CDN URL.
 */
export function buildBaseUrl(container: ContainerHandle, useSsl: boolean, cname?: string): string {
  const base = cname ?? (useSsl ? container.cdn_ssl_url : container.cdn_url);
  return base.replace(/\/+$/, "");
}

/** Escapes like encodeURI, plus `&` and `#` which would otherwise end the path. */
export function encodeObjectPath(objectPath: string): string {
  return encodeURI(objectPath).replace(/&/g, "%26").replace(/#/g, "%23");
}

export function buildObjectUrl(baseUrl: string, objectPath: string): string {
  return `${baseUrl}/${encodeObjectPath(objectPath.replace(/^\/+/, ""))}`;
}
