export { PUBLIC_KEY_LABEL, parsePublicKey } from "./parse-public-key.js";
export { WalletClientImpl } from "./wallet-client.js";
