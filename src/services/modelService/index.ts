export { ModelService } from './modelService'
export type { ModelCallOptions, ModelCallResult, GenerateRequest } from './types'
export {
    buildGenerateRequest,
    isJsonBody,
    readResponseText,
    describeTransportError,
    matchingCallOptions,
    chatCallOptions,
} from './helpers'
export { GENERATE_HEADERS, MAX_CHAIN_LENGTH, MAX_FALLBACKS, SUCCESS_STATUS } from './constants'
