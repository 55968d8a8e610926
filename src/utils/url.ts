import { URL } from 'node:url';

export function hasAcceptedScheme(rawUrl: string): boolean {
  return /^https?:\/\//i.test(rawUrl.trim());
}

export function hostnameOf(rawUrl: string): string {
  try {
    return new URL(rawUrl.trim()).hostname.toLowerCase();
  } catch {
    return '';
  }
}

export function toAbsoluteUrl(value: string, base: string): string {
  try {
    return new URL(value, base).toString();
  } catch {
    return value;
  }
}
