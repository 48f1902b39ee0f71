export type Response =
  | { type: 'ok'; text?: string }
  | { type: 'data'; data: string };

export function ok(text?: string): Response {
  return text === undefined ? { type: 'ok' } : { type: 'ok', text };
}

export function data(value: string): Response {
  return { type: 'data', data: value };
}

/** Percent-escapes the bytes that would break a data line's framing. */
export function escapeData(value: string): string {
  return value.replace(/[%\r\n]/g, (ch) => `%${ch.charCodeAt(0).toString(16).toUpperCase().padStart(2, '0')}`);
}

export function formatResponse(response: Response): string {
  switch (response.type) {
    case 'ok':
      return response.text ? `OK ${response.text}` : 'OK';
    case 'data':
      return `D ${escapeData(response.data)}`;
  }
}
