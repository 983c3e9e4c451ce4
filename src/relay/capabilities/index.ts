import type { RelayConfig } from "../config.js";
import { OpenAICapabilityProvider, type OpenAIProviderConfig } from "./openai.js";
import { StubCapabilityProvider, type CapabilityProvider } from "./types.js";

export * from "./types.js";
export { OpenAICapabilityProvider, type OpenAIProviderConfig } from "./openai.js";

/**
 * OpenAI when an API key is configured, the stub provider otherwise.
 */
export function createCapabilityProvider(config: Pick<RelayConfig, "openai">): CapabilityProvider {
  if (!config.openai) {
    return new StubCapabilityProvider();
  }
  const providerConfig: OpenAIProviderConfig = {
    apiKey: config.openai.apiKey,
    model: config.openai.model,
    ttsModel: config.openai.ttsModel,
    ttsVoice: config.openai.ttsVoice
  };
  if (config.openai.baseUrl) {
    providerConfig.baseUrl = config.openai.baseUrl;
  }
  return new OpenAICapabilityProvider(providerConfig);
}
