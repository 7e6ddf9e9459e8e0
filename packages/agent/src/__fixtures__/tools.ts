/**
 * @fileoverview Fake tools
 */

import { z } from 'zod';
import type { JsonObject } from '@wayfarer/core';
import type { ToolDefinition } from '../executor/tool-registry.js';

export interface CallLog {
  name: string;
  args: JsonObject;
}

/**
 * Resolve after `ms` unless `signal` aborts first
 */
export function delay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    const timer = setTimeout(resolve, ms);
    signal?.addEventListener(
      'abort',
      () => {
        clearTimeout(timer);
        reject(new Error('aborted'));
      },
      { once: true }
    );
  });
}

/**
 * Travel search tools recording their calls in `calls`
 */
export function createTravelTools(calls: CallLog[] = []): ToolDefinition[] {
  return [
    {
      name: 'flight_search_tool',
      description: 'Search flights between two airports',
      parameters: z.object({ origin: z.string().length(3), destination: z.string().length(3) }),
      execute: async (args) => {
        calls.push({ name: 'flight_search_tool', args });
        return { flights: [{ code: 'AI101', from: args.origin, to: args.destination, price: 4200 }] };
      },
    },
    {
      name: 'hotel_search',
      description: 'Search hotels in a city',
      execute: async (args) => {
        calls.push({ name: 'hotel_search', args });
        return { hotels: [{ name: 'Test Residency', city: args.city ?? null }] };
      },
    },
    {
      name: 'train_search',
      description: 'Always reports an upstream error',
      execute: async (args) => {
        calls.push({ name: 'train_search', args });
        return { error: 'rail service unavailable' };
      },
    },
    {
      name: 'map_lookup',
      description: 'Slow lookup',
      execute: async (args, signal) => {
        calls.push({ name: 'map_lookup', args });
        await delay(typeof args.delayMs === 'number' ? args.delayMs : 0, signal);
        return { place: args.query ?? null };
      },
    },
  ];
}
