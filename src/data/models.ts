/**
 * Selectable inference models with their display names.
 */
export const MODEL_CATALOG = [
    { name: 'mistral:7b', display: 'Mistral 7B' },
    { name: 'qwen2.5:72b', display: 'Qwen 72B' },
    { name: 'qwen3-coder:480b-cloud', display: 'Qwen 480B' },
    { name: 'gpt-oss:120b-cloud', display: 'GPT-OSS 120B' },
    { name: 'ollama-default', display: 'Ollama Default' },
] as const

export type ModelName = (typeof MODEL_CATALOG)[number]['name']

/**
 * Largest to smallest. Each model is only reached when its predecessor is unreachable.
 */
export const DEFAULT_MODEL_CHAIN: readonly string[] = ['qwen3-coder:480b-cloud', 'gpt-oss:120b-cloud', 'qwen2.5:72b']

export const DEFAULT_CHAT_MODEL: ModelName = 'mistral:7b'
