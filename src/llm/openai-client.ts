import { createOpenAI } from "@ai-sdk/openai";

export const createOpenAIClient = (params?: { apiKey?: string; baseURL?: string }) => {
  const baseURL = params?.baseURL ?? "https://api.openai.com/v1";
  return createOpenAI({
    baseURL,
    apiKey: params?.apiKey,
  });
};
