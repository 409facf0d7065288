export {
  Fetcher,
  FetchError,
  fetchTransport,
  type FetcherOptions,
  type HttpResponse,
  type HttpTransport,
} from "./fetcher.js";
