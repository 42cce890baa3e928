import { TransientError, defineCapability, isAbortError, errorMessage } from "@resdesk/core";
import type { Capability } from "@resdesk/core";
import { z } from "zod";

export const GRANTS_SEARCH_URL = "https://api.grants.gov/v1/api/search2";
const GRANTS_DETAIL_URL = "https://www.grants.gov/search-results-detail";

const opportunitySchema = z.object({
  id: z.union([z.string(), z.number()]).transform(String),
  number: z.string().optional(),
  title: z.string(),
  agency: z.string().optional(),
  agencyName: z.string().optional(),
  agencyCode: z.string().optional(),
  openDate: z.string().optional(),
  closeDate: z.string().optional(),
  oppStatus: z.string().optional(),
});

const searchResponseSchema = z.object({
  errorcode: z.number().optional(),
  msg: z.string().optional(),
  data: z
    .object({
      hitCount: z.number().default(0),
      oppHits: z.array(opportunitySchema).default([]),
    })
    .optional(),
});

/** The slice of `fetch` the search uses */
export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export interface FundingSearchOptions {
  /** Search endpoint (default: the Grants.gov search2 API) */
  apiUrl?: string;
  fetch?: FetchLike;
}

export function createFundingCapabilities(options: FundingSearchOptions = {}) {
  const apiUrl = options.apiUrl ?? GRANTS_SEARCH_URL;
  const fetchImpl: FetchLike = options.fetch ?? ((url, init) => fetch(url, init));

  const searchFundingOpportunities = defineCapability({
    name: "searchFundingOpportunities",
    description:
      "Search current and forecasted funding opportunities on Grants.gov by keyword. " +
      "Returns agency, program title, open and close dates and a link for each opportunity.",
    sideEffect: "read",
    parameters: z.object({
      keyword: z.string().min(1).describe("Research topic, field or program keyword"),
      limit: z.number().int().min(1).max(25).default(10).describe("Maximum opportunities to return"),
    }),
    async execute({ keyword, limit }, context) {
      let response: Response;
      try {
        response = await fetchImpl(apiUrl, {
          method: "POST",
          headers: { "Content-Type": "application/json" },
          body: JSON.stringify({ keyword, rows: limit, oppStatuses: "forecasted|posted" }),
          signal: context.abortSignal,
        });
      } catch (err: unknown) {
        if (isAbortError(err)) throw err;
        throw new TransientError(`Grants.gov search failed: ${errorMessage(err)}`, { cause: err });
      }

      if (response.status === 429 || response.status >= 500) {
        throw new TransientError(`Grants.gov search failed with HTTP ${response.status}`);
      }
      if (!response.ok) throw new Error(`Grants.gov search failed with HTTP ${response.status}`);

      const body = searchResponseSchema.parse(await response.json());
      if (body.errorcode) throw new Error(`Grants.gov search error ${body.errorcode}: ${body.msg ?? "unknown"}`);

      const hits = body.data?.oppHits ?? [];
      if (hits.length === 0) {
        return { status: "no_opportunities", message: `No open funding opportunities found for '${keyword}'.` };
      }

      return {
        status: "success",
        total: body.data?.hitCount ?? hits.length,
        opportunities: hits.slice(0, limit).map((hit) => ({
          id: hit.id,
          number: hit.number ?? null,
          title: hit.title,
          agency: hit.agency ?? hit.agencyName ?? hit.agencyCode ?? null,
          open_date: hit.openDate ?? null,
          close_date: hit.closeDate ?? null,
          status: hit.oppStatus ?? null,
          link: `${GRANTS_DETAIL_URL}/${hit.id}`,
        })),
      };
    },
  });

  const capabilities: Capability[] = [searchFundingOpportunities];
  return { searchFundingOpportunities, all: capabilities };
}
