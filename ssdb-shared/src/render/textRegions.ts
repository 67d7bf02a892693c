/**
 * In-memory text regions (title, info, output) that views subscribe to.
 */

import type { TextRegionSink, TextRegions } from './types';

export class TextRegion implements TextRegionSink {
  private _text: string;
  private _listeners: Array<(text: string) => void> = [];

  constructor(initial = '') {
    this._text = initial;
  }

  get text(): string {
    return this._text;
  }

  set(text: string): void {
    this._text = text;
    for (const listener of [...this._listeners]) listener(text);
  }

  subscribe(listener: (text: string) => void): () => void {
    this._listeners.push(listener);
    return () => {
      this._listeners = this._listeners.filter(l => l !== listener);
    };
  }
}

export interface TextRegionSet extends TextRegions {
  title: TextRegion;
  info: TextRegion;
  output: TextRegion;
}

export function createTextRegions(): TextRegionSet {
  return {
    title: new TextRegion('Title'),
    info: new TextRegion('Disulfide info'),
    output: new TextRegion(''),
  };
}
