import createDebug from "debug";
import type { HttpRequest, HttpResponse, SwitchyardLogger } from "@switchyard/types";
import { AttributeKey } from "../metadata/attribute-key";
import { FlashMap } from "./flash-map";
import { InMemoryFlashStore, type FlashStore } from "./flash-store";

const debug = createDebug("switchyard:core:flash");

/** Attributes saved for this request by the previous one. Read-only by convention. */
export const INPUT_FLASH_MAP = new AttributeKey(
  "switchyard.flash.input",
  (value): value is FlashMap => value instanceof FlashMap,
);

/** Attributes this request is saving for the next one. */
export const OUTPUT_FLASH_MAP = new AttributeKey(
  "switchyard.flash.output",
  (value): value is FlashMap => value instanceof FlashMap,
);

export const FLASH_MAP_MANAGER = new AttributeKey(
  "switchyard.flash.manager",
  (value): value is FlashMapManager => value instanceof FlashMapManager,
);

export type FlashMapManagerOptions = {
  store?: FlashStore;
  timeToLiveSeconds?: number;
  clock?: () => number;
  logger?: SwitchyardLogger;
};

/**
 * Moves flash attributes between requests of one session. Requests
 * without a session neither receive nor save flash attributes.
 */
export class FlashMapManager {
  readonly store: FlashStore;
  readonly timeToLiveSeconds: number;
  private readonly clock: () => number;
  private readonly logger?: SwitchyardLogger;

  constructor(options: FlashMapManagerOptions = {}) {
    this.store = options.store ?? new InMemoryFlashStore();
    this.timeToLiveSeconds = options.timeToLiveSeconds ?? 180;
    this.clock = options.clock ?? Date.now;
    this.logger = options.logger;
  }

  /**
   * Removes and returns the saved map that best targets this request,
   * discarding the session's expired maps on the way.
   */
  async retrieveAndUpdate(request: HttpRequest, _response: HttpResponse): Promise<FlashMap | null> {
    if (!request.sessionId) return null;
    const flashMap = await this.store.retrieveAndRemoveBestMatch(
      request.sessionId,
      request,
      this.clock(),
    );
    if (flashMap) debug("retrieved flash map for %s %s", request.method, request.path);
    return flashMap;
  }

  /**
   * Stores a non-empty map with its expiration started. A relative target
   * path resolves against the current request's path.
   */
  async saveOutputFlashMap(
    flashMap: FlashMap,
    request: HttpRequest,
    _response: HttpResponse,
  ): Promise<boolean> {
    if (flashMap.isEmpty()) return false;
    if (!request.sessionId) {
      this.logger?.warn("Flash attributes dropped: request has no session", {
        path: request.path,
      });
      return false;
    }

    const target = flashMap.targetRequestPath;
    if (target !== null) flashMap.setTargetRequestPath(resolvePath(target, request.path));
    flashMap.startExpirationPeriod(this.timeToLiveSeconds, this.clock());

    await this.store.save(flashMap, request.sessionId);
    debug("saved flash map targeting %s", flashMap.targetRequestPath ?? "any request");
    return true;
  }

  /**
   * Saves the request's output map for a redirect to `location`, taking
   * the target path and parameters from the location when the map names
   * none. The output map is detached so it is saved at most once.
   */
  async saveForRedirect(request: HttpRequest, response: HttpResponse, location: string): Promise<boolean> {
    const flashMap = OUTPUT_FLASH_MAP.get(request);
    if (!flashMap || flashMap.isEmpty()) return false;
    OUTPUT_FLASH_MAP.remove(request);

    const url = new URL(location, `http://localhost${request.path}`);
    if (flashMap.targetRequestPath === null) {
      flashMap.setTargetRequestPath(decodePath(url.pathname));
    }
    if (flashMap.targetRequestParams.size === 0) {
      for (const [name, value] of url.searchParams) flashMap.addTargetRequestParam(name, value);
    }
    return this.saveOutputFlashMap(flashMap, request, response);
  }

  sweepExpired(): Promise<number> {
    return this.store.sweepExpired(this.clock());
  }
}

function decodePath(path: string): string {
  try {
    return decodeURI(path);
  } catch {
    return path;
  }
}

function resolvePath(target: string, requestPath: string): string {
  const url = new URL(target, `http://localhost${requestPath}`);
  return decodePath(url.pathname);
}

/** Attributes the previous request flashed to this one, or an empty object. */
export function getInputFlashAttributes(request: HttpRequest): Record<string, unknown> {
  return INPUT_FLASH_MAP.get(request)?.toObject() ?? {};
}

/** The map a handler adds attributes to for the next request. */
export function getOutputFlashMap(request: HttpRequest): FlashMap | undefined {
  return OUTPUT_FLASH_MAP.get(request);
}
