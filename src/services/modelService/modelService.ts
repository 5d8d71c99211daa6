import axios, { AxiosInstance } from 'axios'
import { MatcherConfig } from '../../model/config'
import { LogService } from '../logService'
import { GENERATE_HEADERS, MAX_CHAIN_LENGTH, SUCCESS_STATUS } from './constants'
import { buildGenerateRequest, describeBody, describeTransportError, isJsonBody, readResponseText } from './helpers'
import { ModelCallOptions, ModelCallResult } from './types'

/**
 * Client for an Ollama-compatible `/api/generate` endpoint.
 *
 * Each call walks an explicit model chain: the first model is tried once, and the
 * next one is only reached when the previous attempt failed at the transport level
 * (refused connection, timeout, DNS) or answered 200 without a JSON body. Any other
 * HTTP response ends the walk. At most three models are tried per call. The chain
 * position lives in the call, so concurrent calls never affect each other.
 * There is no retry with backoff.
 */
export class ModelService {
    public readonly http: AxiosInstance
    private readonly endpoint: string
    private readonly apiKey?: string

    constructor(
        config: MatcherConfig,
        protected log: LogService,
        http?: AxiosInstance
    ) {
        this.endpoint = config.endpoint
        this.apiKey = config.apiKey
        this.http = http ?? axios.create()
        this.log.debug(`Model client ready for ${this.endpoint}`)
    }

    /**
     * Sends the prompt to each model of the chain in order until one answers.
     *
     * @param prompt - Full prompt text
     * @param chain - Ordered model names; each is attempted at most once
     * @param options - Timeout and sampling settings for this call site
     */
    public async call(prompt: string, chain: readonly string[], options: ModelCallOptions): Promise<ModelCallResult> {
        const attempted: string[] = []
        const models = chain.slice(0, MAX_CHAIN_LENGTH)
        this.log.assert(
            chain.length <= MAX_CHAIN_LENGTH,
            `Model chain has ${chain.length} models, only [${models.join(', ')}] will be tried`,
            undefined,
            'warn'
        )

        for (const model of models) {
            const fallbacks = attempted.length
            attempted.push(model)
            if (fallbacks > 0) {
                this.log.warn(`Falling back to model [${model}] (${fallbacks}/${models.length - 1})`)
            }

            try {
                const response = await this.http.post<unknown>(
                    this.endpoint,
                    buildGenerateRequest(model, prompt, options, this.apiKey),
                    {
                        headers: GENERATE_HEADERS,
                        timeout: options.timeoutMs,
                        // Every status resolves so that only transport failures reach the catch block
                        validateStatus: () => true,
                    }
                )

                if (response.status === SUCCESS_STATUS && !isJsonBody(response.data)) {
                    this.log.error(`Model [${model}] answered without a JSON body: ${describeBody(response.data)}`)
                    continue
                }

                if (response.status === SUCCESS_STATUS) {
                    this.log.debug(`Model [${model}] answered`)
                    return { status: 'ok', text: readResponseText(response.data), model, fallbacks }
                }

                this.log.error(`Model [${model}] returned ${response.status} - ${describeBody(response.data)}`)
                return { status: 'http-error', httpStatus: response.status, model, fallbacks }
            } catch (error) {
                this.log.error(`Model [${model}] unreachable: ${describeTransportError(error)}`)
            }
        }

        this.log.error(`No model available, tried [${attempted.join(', ')}]`)
        return { status: 'unavailable', attempted }
    }

    /**
     * Same as {@link call}, reduced to the generated text, or undefined when no model answered with 200
     */
    public async generate(
        prompt: string,
        chain: readonly string[],
        options: ModelCallOptions
    ): Promise<string | undefined> {
        const result = await this.call(prompt, chain, options)
        return result.status === 'ok' ? result.text : undefined
    }
}
