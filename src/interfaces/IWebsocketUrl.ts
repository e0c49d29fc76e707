type IWebSocketProtocol = 'ws://' | 'wss://';
type IHost = `${string}`;
type IPort = `${string}`;
export type IWebSocketURL = `${IWebSocketProtocol}${IHost}:${IPort}` | `${IWebSocketProtocol}${IHost}:${IPort}/${string}`;

// URL drops a port equal to the scheme default (ws:80, wss:443), so the port is read from the authority itself.
const EXPLICIT_PORT = /^wss?:\/\/[^/?#]*:\d+(?:[/?#]|$)/i;

export const isWebSocketUrl = (value: string): value is IWebSocketURL => {
  let parsed: URL;
  try {
    parsed = new URL(value);
  } catch {
    return false;
  }
  return (parsed.protocol === 'ws:' || parsed.protocol === 'wss:') && parsed.hostname.length > 0 && EXPLICIT_PORT.test(value);
};
