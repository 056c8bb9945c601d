/**
 * Control-bus naming shared with the workers' messaging library. These values
 * are matched byte-for-byte by the workers and must not be reformatted.
 */

/** Fanout exchange every worker's control queue is bound to. */
export const PIDBOX_EXCHANGE = 'celery.pidbox';

/** Direct exchange workers publish their replies to. */
export const REPLY_EXCHANGE = 'reply.celery.pidbox';

/** Suffix appended to a reply token to name the reply list/queue. */
export const REPLY_ADDRESS_SUFFIX = `.reply.${PIDBOX_EXCHANGE}`;

/** Separator used both for priority queue names and binding-registry members. */
export const PRIORITY_SEPARATOR = '\x06\x16';

/** Priority steps workers may fan a reply out to, besides the base address. */
export const PRIORITY_STEPS = [3, 6, 9] as const;

/** Redis set holding the routing-key to reply-list bindings of the reply exchange. */
export const BINDING_REGISTRY_KEY = `_kombu.binding.${REPLY_EXCHANGE}`;

export const PONG_STATUS = 'pong';

export const CONTENT_TYPE_JSON = 'application/json';
export const CONTENT_ENCODING_UTF8 = 'utf-8';
export const PERSISTENT_DELIVERY_MODE = 2;

/** Minimum lifetime of an enveloped control message, in seconds. */
export const MIN_MESSAGE_TTL_SECONDS = 10;
