/**
 * Reduce a domain, host or URL-looking string to its canonical host form.
 *
 * Lower-cases, drops a leading `scheme://`, any leading slashes, the path and
 * the port. Total: an empty input yields an empty output.
 *
 * ```ts
 * normalizeDomain('HTTPS://api.Example.com:443/v1'); // 'api.example.com'
 * ```
 */
export function normalizeDomain(raw: string): string {
  let d = raw.toLowerCase();

  const schemeEnd = d.indexOf('://');
  if (schemeEnd !== -1) {
    const rest = d.slice(schemeEnd + 3);
    // A bare "scheme://" keeps the scheme part rather than collapsing to "".
    d = rest !== '' ? rest : d.slice(0, schemeEnd);
  }

  let start = 0;
  while (start < d.length && d[start] === '/') start++;
  d = d.slice(start);

  const slash = d.indexOf('/');
  if (slash !== -1) d = d.slice(0, slash);

  const colon = d.indexOf(':');
  if (colon !== -1) d = d.slice(0, colon);

  return d;
}
