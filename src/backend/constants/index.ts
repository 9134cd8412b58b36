export { HTTP_STATUS, type HttpStatus } from './http';
export { WS_MAX_PAYLOAD_BYTES, WS_READY_STATE, type WsReadyState } from './websocket';
