// Adapter exports

export { BaseAdapter, type ReconnectOptions } from './base';
export { GeminiAdapter } from './gemini';
