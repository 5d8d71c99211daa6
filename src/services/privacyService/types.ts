/**
 * Copy of a profile safe to send to the inference endpoint. Ephemeral: never stored or cached.
 */
export type AnonymizedProfile = Readonly<Record<string, unknown>>
