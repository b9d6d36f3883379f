import { err, ok, type Result } from "neverthrow";
import { toDegradationKind } from "../../core/entities/appError";
import type { ResolutionFailure } from "../../core/entities/report";
import type { MarketDataGatewayPort } from "../../core/ports/inboundPorts";
import { logger } from "../../shared/logger/logger";

/**
 * Short text whose cased characters are all upper-case is taken to be a ticker already.
 * `^GSPC` qualifies; `Apple`, `aapl` and `123` do not.
 */
export const isCanonicalSymbol = (value: string): boolean =>
  value.length >= 1 &&
  value.length <= 5 &&
  value.toUpperCase() === value &&
  value.toLowerCase() !== value;

/**
 * Turns free-text asset names into ticker symbols, searching the provider only when the text
 * does not already look like one.
 */
export class SymbolResolverService {
  constructor(private readonly gateway: MarketDataGatewayPort) {}

  async resolve(name: string): Promise<Result<string, ResolutionFailure>> {
    const query = name.trim();

    if (!query) {
      return err({ kind: "resolution_failure", query, reason: "empty_input" });
    }

    if (isCanonicalSymbol(query)) {
      return ok(query);
    }

    const search = await this.gateway.searchSymbols({ query, limit: 1 });

    if (search.isErr()) {
      logger.warn(
        { query, code: search.error.code, provider: search.error.provider },
        "Symbol search failed",
      );
      return err({
        kind: "resolution_failure",
        query,
        reason: toDegradationKind(search.error),
      });
    }

    const symbol = search.value.at(0)?.symbol.trim();
    if (!symbol) {
      return err({ kind: "resolution_failure", query, reason: "no_match" });
    }

    logger.debug({ query, symbol }, "Resolved asset name");
    return ok(symbol);
  }
}
