/**
 * Message Formatters
 *
 * Producers of payload bytes for common QR contents. Each one only builds
 * bytes; none of them validates the meaning of what it encodes.
 */

import type { QrMessageFormatter } from '../types/qr';

const encoder = new TextEncoder();

/**
 * Plain UTF-8 text.
 */
export class TextMessage implements QrMessageFormatter {
  constructor(readonly text: string) {}

  toPayloadBytes(): Uint8Array {
    return encoder.encode(this.text);
  }
}

/**
 * A link, encoded as-is.
 */
export class LinkMessage implements QrMessageFormatter {
  constructor(readonly url: string) {}

  toPayloadBytes(): Uint8Array {
    return encoder.encode(this.url.trim());
  }
}

export type WifiSecurity = 'WPA' | 'WEP' | 'nopass';

export interface WifiCredentials {
  ssid: string;
  password?: string;
  security?: WifiSecurity;
  hidden?: boolean;
}

// Backslash, semicolon, comma, colon and double quote are escaped
function escapeWifiField(value: string): string {
  return value.replace(/([\\;,:"])/g, '\\$1');
}

/**
 * Wi-Fi network join code, `WIFI:T:<security>;S:<ssid>;P:<password>;H:true;;`
 */
export class WifiMessage implements QrMessageFormatter {
  constructor(readonly credentials: WifiCredentials) {}

  toPayloadBytes(): Uint8Array {
    const { ssid, password, security = 'WPA', hidden = false } = this.credentials;

    let content = `WIFI:T:${security};S:${escapeWifiField(ssid)};`;
    if (security !== 'nopass' && password) {
      content += `P:${escapeWifiField(password)};`;
    }
    if (hidden) {
      content += 'H:true;';
    }
    content += ';';

    return encoder.encode(content);
  }
}
