import { describe, it, expect } from "vitest";
import { Dispatcher } from "../../src/dispatch/dispatcher";
import type { FunctionHandler } from "../../src/adapters/function-handler-adapter";
import type { HandlerInterceptor } from "../../src/interfaces";
import { sendRedirect } from "../../src/dispatch/http-utils";
import type { HandlerMethodContext } from "../../src/handlers/handler-method";
import { RequestMappingHandlerMapping } from "../../src/handlers/mapping/request-mapping-handler-mapping";
import { SimpleUrlHandlerMapping } from "../../src/handlers/mapping/simple-url-handler-mapping";
import { FlashMapManager, getInputFlashAttributes, getOutputFlashMap } from "../../src/flash/flash-map-manager";
import { FlashMap } from "../../src/flash/flash-map";
import { InMemoryFlashStore } from "../../src/flash/flash-store";
import { RedirectViewResolver, StaticViewResolver } from "../../src/views/view-resolvers";
import { mockRequest, mockResponse } from "../../src/testing/mock-http";
import { createMockLogger, recordingView } from "../helpers";

class AccountsController {
  create({ redirectAttributes }: HandlerMethodContext): string {
    redirectAttributes.addAttribute("id", 42).addFlashAttribute("message", "Account created");
    return "redirect:/accounts/{id}";
  }

  show(): string {
    return "accounts/show";
  }
}

describe("flash attributes across a redirect", () => {
  it("should carry flash attributes from the POST to the redirected GET once", async () => {
    // Arrange
    const rendered: Record<string, unknown>[] = [];
    const mapping = new RequestMappingHandlerMapping().registerController(
      new AccountsController(),
      { path: "/accounts" },
      {
        create: { path: "", method: "POST" },
        show: { path: "/{id}", method: "GET" },
      },
    );
    const dispatcher = new Dispatcher({
      handlerMappings: [mapping],
      viewResolvers: [
        new RedirectViewResolver(),
        new StaticViewResolver({ "accounts/show": recordingView(rendered) }),
      ],
      flashMapManager: new FlashMapManager({ store: new InMemoryFlashStore() }),
      logger: createMockLogger(),
    });
    const postResponse = mockResponse();

    // Act
    await dispatcher.dispatch(mockRequest("POST", "/accounts"), postResponse);
    await dispatcher.dispatch(mockRequest("GET", "/accounts/42"), mockResponse());
    await dispatcher.dispatch(mockRequest("GET", "/accounts/42"), mockResponse());

    // Assert
    expect(postResponse.status).toBe(302);
    expect(postResponse.headers.location).toBe("/accounts/42");
    expect(rendered).toEqual([{ message: "Account created" }, {}]);
  });

  it("should save flash attributes when the handler wrote the redirect itself", async () => {
    // Arrange
    const store = new InMemoryFlashStore();
    const seen: Record<string, unknown>[] = [];
    const save: FunctionHandler = (request, response) => {
      getOutputFlashMap(request)?.set("notice", "Saved");
      sendRedirect(response, "/done", 303);
      return null;
    };
    const done: FunctionHandler = (request) => {
      seen.push(getInputFlashAttributes(request));
      return null;
    };
    const dispatcher = new Dispatcher({
      handlerMappings: [new SimpleUrlHandlerMapping({ "/save": save, "/done": done })],
      flashMapManager: new FlashMapManager({ store }),
      logger: createMockLogger(),
    });

    // Act
    await dispatcher.dispatch(mockRequest("POST", "/save"), mockResponse());
    await dispatcher.dispatch(mockRequest("GET", "/done", { sessionId: "other-session" }), mockResponse());
    await dispatcher.dispatch(mockRequest("GET", "/done"), mockResponse());

    // Assert
    expect(seen).toEqual([{}, { notice: "Saved" }]);
    expect(store.peek("test-session")).toEqual([]);
  });

  it("should not copy incoming flash attributes into a redirect URL", async () => {
    // Arrange
    const store = new InMemoryFlashStore();
    const flash = new FlashMap();
    flash.set("notice", "test-secret");
    flash.setTargetRequestPath("/a");
    await store.save(flash, "test-session");
    const forward: FunctionHandler = () => "redirect:/b";
    const dispatcher = new Dispatcher({
      handlerMappings: [new SimpleUrlHandlerMapping({ "/a": forward })],
      viewResolvers: [new RedirectViewResolver()],
      flashMapManager: new FlashMapManager({ store }),
      logger: createMockLogger(),
    });
    const response = mockResponse();

    // Act
    await dispatcher.dispatch(mockRequest("GET", "/a"), response);

    // Assert
    expect(response.status).toBe(302);
    expect(response.headers.location).toBe("/b");
  });

  it("should save an interceptor's redirect flash before its cleanup runs", async () => {
    // Arrange
    const store = new InMemoryFlashStore();
    const pendingAtCleanup: number[] = [];
    const guard: HandlerInterceptor = {
      preHandle: (request, response) => {
        getOutputFlashMap(request)?.set("error", "Sign in first");
        sendRedirect(response, "/login");
        return false;
      },
      afterCompletion: () => {
        pendingAtCleanup.push(store.peek("test-session").length);
      },
    };
    const page: FunctionHandler = () => null;
    const mapping = new SimpleUrlHandlerMapping({ "/private": page }).addInterceptor(guard);
    const dispatcher = new Dispatcher({
      handlerMappings: [mapping],
      flashMapManager: new FlashMapManager({ store }),
      logger: createMockLogger(),
    });
    const response = mockResponse();

    // Act
    await dispatcher.dispatch(mockRequest("GET", "/private"), response);

    // Assert
    expect(response.headers.location).toBe("/login");
    expect(pendingAtCleanup).toEqual([1]);
    expect(store.peek("test-session")[0]?.toObject()).toEqual({ error: "Sign in first" });
  });

  it("should not keep flash attributes without a redirect", async () => {
    const store = new InMemoryFlashStore();
    const page: FunctionHandler = (request) => {
      getOutputFlashMap(request)?.set("notice", "ignored");
      return null;
    };
    const dispatcher = new Dispatcher({
      handlerMappings: [new SimpleUrlHandlerMapping({ "/page": page })],
      flashMapManager: new FlashMapManager({ store }),
      logger: createMockLogger(),
    });

    await dispatcher.dispatch(mockRequest("GET", "/page"), mockResponse());

    expect(store.peek("test-session")).toEqual([]);
  });
});
