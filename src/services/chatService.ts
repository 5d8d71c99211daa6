import Handlebars from 'handlebars'
import { MatcherConfig } from '../model/config'
import {
    CHAT_CONNECTION_MESSAGE,
    CHAT_EMPTY_RESPONSE,
    CHAT_FAILURE_MESSAGE,
    CHAT_PROMPT_TEMPLATE,
    CHAT_SYSTEM_PROMPTS,
    ChatContext,
} from '../model/messages'
import { LogService } from './logService'
import { chatCallOptions, ModelCallOptions, ModelService } from './modelService'

export interface ChatExchange {
    user: string
    assistant: string
    context: ChatContext
    timestamp: string
}

const chatPrompt = Handlebars.compile(CHAT_PROMPT_TEMPLATE, { noEscape: true })

export const buildChatPrompt = (message: string, context: ChatContext): string =>
    chatPrompt({ systemPrompt: CHAT_SYSTEM_PROMPTS[context], message })

/**
 * Support chat for children, families and caseworkers, backed by a single chat model.
 * Answers are always text: failures are turned into fixed apology messages.
 */
export class ChatService {
    private readonly exchanges: ChatExchange[] = []
    private readonly callOptions: ModelCallOptions
    private readonly chain: readonly string[]

    constructor(
        config: MatcherConfig,
        private log: LogService,
        private models: ModelService
    ) {
        this.callOptions = chatCallOptions(config)
        this.chain = [config.chatModel]
    }

    /**
     * @param message - What the user typed
     * @param context - Audience, selects the system prompt
     */
    public async generateResponse(message: string, context: ChatContext = 'general'): Promise<string> {
        try {
            const result = await this.models.call(buildChatPrompt(message, context), this.chain, this.callOptions)

            switch (result.status) {
                case 'ok': {
                    const answer = result.text || CHAT_EMPTY_RESPONSE
                    this.exchanges.push({
                        user: message,
                        assistant: answer,
                        context,
                        timestamp: new Date().toISOString(),
                    })
                    return answer
                }
                case 'http-error':
                    return CHAT_CONNECTION_MESSAGE
                case 'unavailable':
                    return CHAT_FAILURE_MESSAGE
            }
        } catch (error) {
            this.log.error('Chat response failed', error)
            return CHAT_FAILURE_MESSAGE
        }
    }

    /**
     * Copy of the exchanges so far, oldest first
     */
    public history(): ChatExchange[] {
        return this.exchanges.map((exchange) => ({ ...exchange }))
    }

    public clearHistory(): void {
        this.exchanges.length = 0
    }
}
