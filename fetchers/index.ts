/**
 * Data Fetchers - Index
 */

export {
  fetchFearGreedHistory,
  parseGraphData,
  CNN_GRAPHDATA_URL,
  DEFAULT_USER_AGENT,
  DEFAULT_FETCH_OPTIONS,
  type FetchOptions,
} from './cnn-fear-greed';
