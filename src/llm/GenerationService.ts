import { buildUserPrompt, getSystemPrompt } from "../agents/roles.js"
import { getDefaultModel } from "../core/Config.js"
import { ConfigError } from "../core/errors.js"
import { log } from "../core/Logger.js"
import type {
    AgentKind,
    GeneratedArtifact,
    GenerationInput,
    GenerationService,
    LLMProvider,
    LLMProviderType,
} from "../types.js"
import { parseGenerationOutput } from "../workflow/parsers.js"

export interface LLMGenerationServiceOptions {
    providers: Partial<Record<LLMProviderType, LLMProvider>>
    defaultProvider?: LLMProviderType
    defaultModel?: string
}

/** Generation calls backed by a chat-completion provider. */
export class LLMGenerationService implements GenerationService {
    private readonly options: LLMGenerationServiceOptions

    constructor(options: LLMGenerationServiceOptions) {
        this.options = options
    }

    public async invoke(
        kind: AgentKind,
        input: GenerationInput,
        signal?: AbortSignal
    ): Promise<GeneratedArtifact> {
        const model = getDefaultModel(
            kind,
            this.options.defaultProvider,
            this.options.defaultModel
        )
        const provider = this.options.providers[model.provider]
        if (!provider) {
            throw new ConfigError(
                `No ${model.provider} provider configured for the ${kind} agent`
            )
        }

        log.llm("%s -> %s/%s", kind, model.provider, model.model)
        const response = await provider.complete(
            [
                { role: "system", content: getSystemPrompt(kind) },
                { role: "user", content: buildUserPrompt(input) },
            ],
            model,
            signal
        )
        log.llm(
            "%s answered with %d tokens",
            kind,
            response.usage.totalTokens
        )

        return {
            ...parseGenerationOutput(kind, response.content),
            usage: response.usage,
        }
    }
}
