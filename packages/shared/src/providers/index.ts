export { selectProvider, type ProviderSelection } from "./selector.js";
