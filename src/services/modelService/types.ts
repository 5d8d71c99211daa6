/**
 * Per-call settings. Timeouts differ by call site (matching vs chat).
 */
export interface ModelCallOptions {
    timeoutMs: number
    temperature: number
    numPredict: number
}

/**
 * Body of `POST /api/generate`
 */
export interface GenerateRequest {
    model: string
    prompt: string
    stream: false
    options: {
        temperature: number
        num_predict: number
    }
    api_key?: string
}

/**
 * Outcome of walking a model chain for one prompt.
 *
 * - `ok`: a model answered with HTTP 200
 * - `http-error`: a model answered with another status; the chain is not continued
 * - `unavailable`: every model tried failed at the transport level or sent no JSON body
 */
export type ModelCallResult =
    | { status: 'ok'; text: string; model: string; fallbacks: number }
    | { status: 'http-error'; httpStatus: number; model: string; fallbacks: number }
    | { status: 'unavailable'; attempted: string[] }
