import OpenAI from "openai"

import { GenerationError } from "../core/errors.js"
import type {
    LLMMessage,
    LLMProvider,
    LLMResponse,
    ModelConfig,
} from "../types.js"
import { toGenerationError } from "./errors.js"

export class OpenAIProvider implements LLMProvider {
    private client: OpenAI

    constructor(apiKey: string) {
        this.client = new OpenAI({ apiKey })
    }

    public async complete(
        messages: LLMMessage[],
        model: ModelConfig,
        signal?: AbortSignal
    ): Promise<LLMResponse> {
        try {
            const response = await this.client.chat.completions.create(
                {
                    model: model.model,
                    messages: messages.map(toOpenAIMessage),
                    temperature: model.temperature,
                    max_completion_tokens: model.maxTokens,
                },
                { signal }
            )

            const choice = response.choices[0]
            if (!choice) {
                throw new GenerationError("OpenAI returned no choices", true)
            }
            if (choice.finish_reason === "length") {
                throw new GenerationError(
                    "OpenAI response was cut off at the token limit",
                    false
                )
            }

            return {
                content: choice.message.content ?? "",
                usage: {
                    promptTokens: response.usage?.prompt_tokens ?? 0,
                    completionTokens: response.usage?.completion_tokens ?? 0,
                    totalTokens: response.usage?.total_tokens ?? 0,
                },
            }
        } catch (error) {
            throw toGenerationError("OpenAI", error)
        }
    }
}

function toOpenAIMessage(msg: LLMMessage): OpenAI.ChatCompletionMessageParam {
    switch (msg.role) {
        case "system":
            return { role: "system", content: msg.content }
        case "user":
            return { role: "user", content: msg.content }
        case "assistant":
            return { role: "assistant", content: msg.content }
    }
}
