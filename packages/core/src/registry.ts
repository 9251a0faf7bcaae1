/**
 * Handler Registry - stores marker definitions and the handlers claiming them
 */

import type { MarkerHandler } from "./handler.js";
import type { MarkerDefinition, MarkerName } from "./types.js";

export interface HandlerRegistry {
  /** Make a marker known to discovery */
  registerMarker(marker: MarkerDefinition): void;

  /**
   * Register a handler for every marker it claims. Registering the same
   * handler twice is a no-op.
   *
   * @throws Error when the handler claims no markers, claims an unknown
   * marker, or claims a marker another handler already owns
   */
  register(handler: MarkerHandler): void;

  getHandler(marker: MarkerName): MarkerHandler | undefined;

  getMarker(name: MarkerName): MarkerDefinition | undefined;

  getMarkers(): MarkerDefinition[];

  /** Registered handlers, each once, in registration order */
  getHandlers(): MarkerHandler[];

  /** Clear everything (useful for testing) */
  clear(): void;
}

class HandlerRegistryImpl implements HandlerRegistry {
  private markers = new Map<MarkerName, MarkerDefinition>();
  private claims = new Map<MarkerName, MarkerHandler>();
  private handlers: MarkerHandler[] = [];

  registerMarker(marker: MarkerDefinition): void {
    const existing = this.markers.get(marker.name);
    if (existing) {
      // Idempotent: skip if semantically same marker
      if (isSameMarker(existing, marker)) return;
      throw new Error(`Marker '${marker.name}' is already registered`);
    }
    if (!marker.jsDocTag && !marker.decorator) {
      throw new Error(`Marker '${marker.name}' needs a JSDoc tag or a decorator name`);
    }
    this.markers.set(marker.name, marker);
  }

  register(handler: MarkerHandler): void {
    if (this.handlers.includes(handler)) return;

    const claimed = [...handler.markersHandled()];
    if (claimed.length === 0) {
      throw new Error(`Handler '${handler.name}' claims no markers`);
    }

    for (const marker of claimed) {
      if (!this.markers.has(marker)) {
        throw new Error(`Handler '${handler.name}' claims unknown marker '${marker}'`);
      }
      const owner = this.claims.get(marker);
      if (owner) {
        throw new Error(
          `Marker '${marker}' is already handled by '${owner.name}', cannot register '${handler.name}'`
        );
      }
    }

    for (const marker of claimed) {
      this.claims.set(marker, handler);
    }
    this.handlers.push(handler);
  }

  getHandler(marker: MarkerName): MarkerHandler | undefined {
    return this.claims.get(marker);
  }

  getMarker(name: MarkerName): MarkerDefinition | undefined {
    return this.markers.get(name);
  }

  getMarkers(): MarkerDefinition[] {
    return [...this.markers.values()];
  }

  getHandlers(): MarkerHandler[] {
    return [...this.handlers];
  }

  clear(): void {
    this.markers.clear();
    this.claims.clear();
    this.handlers = [];
  }
}

function isSameMarker(a: MarkerDefinition, b: MarkerDefinition): boolean {
  return a.name === b.name && a.jsDocTag === b.jsDocTag && a.decorator === b.decorator;
}

/** Global handler registry singleton */
export const globalHandlerRegistry: HandlerRegistry = new HandlerRegistryImpl();

/** Create a new isolated registry (for testing or scoped usage) */
export function createHandlerRegistry(): HandlerRegistry {
  return new HandlerRegistryImpl();
}

/**
 * Define a marker. Returns the definition for chaining into `registerMarker`.
 */
export function defineMarker(options: MarkerDefinition): MarkerDefinition {
  return {
    name: options.name,
    description: options.description,
    jsDocTag: options.jsDocTag,
    decorator: options.decorator,
  };
}
