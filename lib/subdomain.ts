import { domainToASCII } from 'url';
import * as psl from 'psl';
import { InputError } from './errors';

// Hostname grammar for scan targets: dot-separated labels, alphabetic TLD.
const TARGET_RE = /^(?=.{1,253}$)([a-z0-9](?:[a-z0-9-]{0,61}[a-z0-9])?\.)+[a-z]{2,63}$/;

/**
 * Normalize an input string to a host (ASCII/punycode), lowercase, stripped of protocol/path/port.
 * Returns the ASCII host or throws Error if can't parse.
 */
export function normalizeDomain(input: string): string {
  if (!input || typeof input !== 'string') {
    throw new Error('Invalid input');
  }

  let s = input.trim();
  if (!/^[a-zA-Z][a-zA-Z0-9+.-]*:\/\//.test(s)) {
    s = 'http://' + s;
  }
  try {
    // WHATWG URL already converts IDN labels to punycode
    const hostname = new URL(s).hostname.toLowerCase();
    return hostname.replace(/^\.+|\.+$/g, '');
  } catch {
    throw new Error('Unable to normalize domain');
  }
}

/**
 * Basic host validation: psl must find a registrable domain in it.
 */
export function isValidHost(host: string): boolean {
  if (!host || typeof host !== 'string') return false;
  const cleaned = host.trim().toLowerCase();
  if (/\s/.test(cleaned)) return false;
  const ascii = domainToASCII(cleaned);
  if (!ascii || ascii.length > 255) return false;
  // null for bare public suffixes and hosts psl cannot place under a registrable domain
  return psl.get(ascii) !== null;
}

/**
 * Validate a `target` query parameter and return it normalized.
 * Throws InputError for missing, malformed or bare-public-suffix targets.
 */
export function parseTarget(raw: string | null | undefined): string {
  if (!raw || !raw.trim()) {
    throw new InputError('missing target parameter');
  }
  const target = raw.trim().toLowerCase().replace(/\.$/, '');
  if (!TARGET_RE.test(target) || !isValidHost(target)) {
    throw new InputError('invalid domain format');
  }
  return target;
}

/**
 * Lowercase, strip a leading `*.` wildcard and a trailing root dot.
 */
export function cleanCandidate(name: string): string {
  return name.trim().toLowerCase().replace(/^\*\./, '').replace(/\.$/, '');
}

/**
 * Host of a URL authority (`user@host:port`), with userinfo and port removed
 * and cleaned like any other candidate.
 */
export function hostFromAuthority(authority: string): string {
  return cleanCandidate(authority.slice(authority.lastIndexOf('@') + 1).replace(/:\d*$/, ''));
}

// One DNS label: letters, digits and inner hyphens.
const LABEL_RE = /^[a-z0-9](?:[a-z0-9-]{0,61}[a-z0-9])?$/;

/** True iff every label of `host` is a plain hostname label. */
export function isHostname(host: string): boolean {
  return host.length > 0 && host.length <= 253 && host.split('.').every((label) => LABEL_RE.test(label));
}

/**
 * True iff host is a well-formed hostname and a strict subdomain of target
 * (suffix `.target`, not the apex itself).
 */
export function isSubdomainOf(host: string, target: string): boolean {
  return host !== target && host.endsWith(`.${target}`) && isHostname(host);
}

/**
 * True when no allow-list is configured, or host equals or falls under one of its entries.
 */
export function isAllowedDomain(host: string, allowed: readonly string[]): boolean {
  if (allowed.length === 0) return true;
  const h = host.toLowerCase().replace(/\.$/, '');
  return allowed.some((d) => h === d || h.endsWith(`.${d}`));
}
