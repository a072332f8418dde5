import type { FilterContext } from '../filter-context.js';
import type { Filter, FilterList, FilterListData, TriggeredFilter } from './types.js';

const LIST_NAME = 'domain';
const URL_RE = /https?:\/\/[^\s<>"]+/gi;

function hostnameOf(url: string): string | null {
  try {
    return new URL(url).hostname.toLowerCase();
  } catch {
    return null;
  }
}

/** Hostnames of every URL in the message text and its embeds, deduplicated. */
export function extractHostnames(ctx: Readonly<FilterContext>): string[] {
  const urls: string[] = [...(ctx.content.match(URL_RE) ?? [])];
  for (const embed of ctx.embeds) {
    if (embed.url) urls.push(embed.url);
  }

  const hosts = new Set<string>();
  for (const url of urls) {
    const host = hostnameOf(url);
    if (host !== null) hosts.add(host);
  }
  return [...hosts];
}

function matchesDomain(host: string, domain: string): boolean {
  return host === domain || host.endsWith(`.${domain}`);
}

/**
 * Domain filter list.
 *
 * Each filter's content is a domain name; it matches URLs on that domain
 * or any of its subdomains.
 */
export function createDomainFilterList(): FilterList {
  const filters: Filter[] = [];

  return {
    name: LIST_NAME,
    events: ['message', 'message_edit'],
    filters,

    addList(data: FilterListData): void {
      filters.push(...data.filters);
    },

    async triggersFor(ctx: Readonly<FilterContext>): Promise<TriggeredFilter[]> {
      const hosts = extractHostnames(ctx);
      if (hosts.length === 0) return [];

      const triggered: TriggeredFilter[] = [];
      for (const filter of filters) {
        const domain = filter.content.toLowerCase();
        const found = hosts.filter((host) => matchesDomain(host, domain));
        if (found.length > 0) {
          triggered.push({ ...filter, matches: found });
        }
      }
      return triggered;
    },
  };
}
