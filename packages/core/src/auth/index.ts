export {
  createTokenProvider,
  TOKEN_REFRESH_MARGIN_SECONDS,
  type TokenProvider,
  type TokenProviderOptions,
} from "./iam-token.js";
