export type JsonPrimitive = string | number | boolean | null

export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue }

/**
 * Order Details
 *
 * The caller's order submission, exactly as parsed from the request body.
 * It is not validated against a schema and never stored; it travels
 * unchanged into the `details` field of the order_created event.
 */
export type OrderDetails = { [key: string]: JsonValue } | JsonValue[]
