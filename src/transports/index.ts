export { DeviceServer, WebSocketConnection } from "./websocket.js";
export type { DeviceServerOptions } from "./websocket.js";
