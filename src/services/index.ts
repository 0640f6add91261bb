/**
 * Services Index
 *
 * Adapters between the core pipeline and the outside world:
 * - ClobExchangeClient / SimulatedExchangeClient: ExchangeClient
 * - GammaMarketCatalog: MarketCatalog
 * - StaticWhaleDirectory: WhaleDirectory from a metrics file
 * - WhaleActivityFeed, PriceFeed: REST pollers
 * - UserFillStream: websocket user channel into the fill bus
 */

export type {
  ExchangeClient,
  ExchangeOrderStatus,
  FillStatus,
  HttpGetter,
  MarketCatalog,
  SubmitOrderRequest,
  SubmitOrderResult,
} from "./interfaces";

export {
  ClobExchangeClient,
  normalizeOrderStatus,
  parsePostOrderResponse,
  type ClobOrderApi,
} from "./clob-exchange-client";
export { SimulatedExchangeClient, type BookSource } from "./simulated-exchange-client";
export { GammaMarketCatalog, parseGammaMarket } from "./market-catalog";
export { StaticWhaleDirectory, parseWhaleMetrics } from "./whale-directory";
export { WhaleActivityFeed, parseActivity, type WhaleActivityFeedDeps } from "./whale-activity-feed";
export { PriceFeed, parseMidpoint, type PriceFeedDeps } from "./price-feed";
export {
  UserFillStream,
  parseUserMessages,
  type UserFillStreamOptions,
  type UserMessage,
  type UserStreamCredentials,
  type UserStreamState,
} from "./user-fill-stream";
