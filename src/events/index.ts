export { EventBus } from './eventBus.js';
export type { EventBusOptions } from './eventBus.js';
export { Listener, withListener, withListenerAsync } from './listener.js';
export { defineMessage, describeKind, isMessageOf, keyOf, keyOfMessage, MessageToken } from './messageKind.js';
export type { MessageClass, MessageGuard, MessageKind } from './messageKind.js';
export { TypedCallback } from './erasedCallback.js';
export type { ErasedCallback } from './erasedCallback.js';
export { RegistrationTable } from './registrationTable.js';
export type { CallbackGroup } from './registrationTable.js';
