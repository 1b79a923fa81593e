import Anthropic from "@anthropic-ai/sdk"

import type {
    LLMMessage,
    LLMProvider,
    LLMResponse,
    ModelConfig,
} from "../types.js"
import { toGenerationError } from "./errors.js"

export class AnthropicProvider implements LLMProvider {
    private client: Anthropic

    constructor(apiKey: string) {
        this.client = new Anthropic({ apiKey })
    }

    public async complete(
        messages: LLMMessage[],
        model: ModelConfig,
        signal?: AbortSignal
    ): Promise<LLMResponse> {
        try {
            const { system, anthropicMessages } = convertMessages(messages)
            const response = await this.client.messages.create(
                {
                    model: model.model,
                    system: system || undefined,
                    messages: anthropicMessages,
                    temperature: model.temperature,
                    max_tokens: model.maxTokens ?? 4096,
                },
                { signal }
            )

            let textContent = ""
            for (const block of response.content) {
                if (block.type === "text") {
                    textContent += block.text
                }
            }

            return {
                content: textContent,
                usage: {
                    promptTokens: response.usage.input_tokens,
                    completionTokens: response.usage.output_tokens,
                    totalTokens:
                        response.usage.input_tokens +
                        response.usage.output_tokens,
                },
            }
        } catch (error) {
            throw toGenerationError("Anthropic", error)
        }
    }
}

interface ConvertedMessages {
    system: string
    anthropicMessages: Anthropic.MessageParam[]
}

function convertMessages(messages: LLMMessage[]): ConvertedMessages {
    let system = ""
    const anthropicMessages: Anthropic.MessageParam[] = []

    for (const msg of messages) {
        if (msg.role === "system") {
            system += (system ? "\n\n" : "") + msg.content
            continue
        }
        anthropicMessages.push({ role: msg.role, content: msg.content })
    }

    return { system, anthropicMessages }
}
