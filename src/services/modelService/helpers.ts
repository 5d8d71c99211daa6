import { isAxiosError } from 'axios'
import { MatcherConfig } from '../../model/config'
import { GenerateRequest, ModelCallOptions } from './types'

export const buildGenerateRequest = (
    model: string,
    prompt: string,
    options: ModelCallOptions,
    apiKey?: string
): GenerateRequest => {
    const request: GenerateRequest = {
        model,
        prompt,
        stream: false,
        options: {
            temperature: options.temperature,
            num_predict: options.numPredict,
        },
    }
    if (apiKey) {
        request.api_key = apiKey
    }
    return request
}

/**
 * A generate reply is a JSON object. Strings (HTML error pages from proxies) and arrays are not.
 */
export const isJsonBody = (data: unknown): data is object =>
    typeof data === 'object' && data !== null && !Array.isArray(data)

/**
 * Text of a successful generate body; empty when the body has no `response` string
 */
export const readResponseText = (data: unknown): string => {
    if (typeof data === 'object' && data !== null && 'response' in data && typeof data.response === 'string') {
        return data.response
    }
    return ''
}

/**
 * Short description of a transport failure for logs
 */
export const describeTransportError = (error: unknown): string => {
    if (isAxiosError(error)) {
        return error.code ? `${error.code}: ${error.message}` : error.message
    }
    return error instanceof Error ? error.message : String(error)
}

export const describeBody = (data: unknown): string => {
    if (typeof data === 'string') return data
    try {
        return JSON.stringify(data)
    } catch {
        return String(data)
    }
}

export const matchingCallOptions = (config: MatcherConfig): ModelCallOptions => ({
    timeoutMs: config.matchTimeout * 1000,
    temperature: config.temperature,
    numPredict: config.matchNumPredict,
})

export const chatCallOptions = (config: MatcherConfig): ModelCallOptions => ({
    timeoutMs: config.chatTimeout * 1000,
    temperature: config.temperature,
    numPredict: config.chatNumPredict,
})
