export {
  NetworkLayer,
  type LinkOptions,
  type LinkBreakOutcome,
  type IdSource,
} from "./network-layer.js";
export { TransportNetwork } from "./transport-network.js";
