import { describe, it, expect } from "vitest";
import { RequestMappingHandlerMapping } from "../../../src/handlers/mapping/request-mapping-handler-mapping";
import { BEST_MATCHING_PATTERN, URI_TEMPLATE_VARIABLES } from "../../../src/handlers/mapping/attributes";
import { HandlerMethod } from "../../../src/handlers/handler-method";
import { MappedInterceptor } from "../../../src/handlers/interceptors";
import { AmbiguousMappingError } from "../../../src/errors/dispatch-errors";
import { mockRequest } from "../../../src/testing/mock-http";
import { recordingInterceptor } from "../../helpers";

class AccountsController {
  list(): string {
    return "accounts/list";
  }

  show(): string {
    return "accounts/show";
  }

  create(): string {
    return "redirect:/accounts";
  }

  newForm(): string {
    return "accounts/new";
  }
}

function itemById(): void {}
function itemByName(): void {}

describe("RequestMappingHandlerMapping", () => {
  // ----------------------------------------------------------------
  // Controller registration
  // ----------------------------------------------------------------

  function controllerMapping(): RequestMappingHandlerMapping {
    return new RequestMappingHandlerMapping().registerController(
      new AccountsController(),
      { path: "/accounts" },
      {
        list: { path: "", method: "GET" },
        show: { path: "/{id}", method: "GET" },
        create: { path: "", method: "POST" },
        newForm: { path: "/new", method: "GET" },
      },
    );
  }

  it("should register each method under the combined mapping", () => {
    const mapping = controllerMapping();

    expect(mapping.getRegistrations().map((r) => r.info.toString())).toEqual([
      "{GET /accounts}",
      "{GET /accounts/{id}}",
      "{POST /accounts}",
      "{GET /accounts/new}",
    ]);
  });

  it("should resolve a request to the matching handler method and expose the match", async () => {
    // Arrange
    const mapping = controllerMapping();
    const request = mockRequest("GET", "/accounts/42");

    // Act
    const chain = await mapping.getHandler(request);

    // Assert
    expect(chain?.handler).toBeInstanceOf(HandlerMethod);
    expect(String(chain?.handler)).toBe("AccountsController#show");
    expect(BEST_MATCHING_PATTERN.get(request)).toBe("/accounts/{id}");
    expect(URI_TEMPLATE_VARIABLES.get(request)).toEqual({ id: "42" });
  });

  it("should prefer a literal path over a template", async () => {
    const chain = await controllerMapping().getHandler(mockRequest("GET", "/accounts/new"));

    expect(String(chain?.handler)).toBe("AccountsController#newForm");
  });

  it("should select by method", async () => {
    const chain = await controllerMapping().getHandler(mockRequest("POST", "/accounts"));

    expect(String(chain?.handler)).toBe("AccountsController#create");
  });

  it("should return null when nothing matches", async () => {
    expect(await controllerMapping().getHandler(mockRequest("DELETE", "/accounts/1"))).toBeNull();
  });

  // ----------------------------------------------------------------
  // Conflicts
  // ----------------------------------------------------------------

  it("should reject the same conditions for a different handler", () => {
    const mapping = new RequestMappingHandlerMapping().register({ path: "/items", method: "GET" }, itemById);

    expect(() => mapping.register({ path: "/items", method: "GET" }, itemByName)).toThrow(
      new AmbiguousMappingError(
        "Cannot map itemByName to {GET /items}: itemById is already mapped there",
        ["itemById", "itemByName"],
      ),
    );
  });

  it("should ignore registering the same handler twice", () => {
    const mapping = new RequestMappingHandlerMapping()
      .register({ path: "/items", method: "GET" }, itemById)
      .register({ path: "/items", method: "GET" }, itemById);

    expect(mapping.getRegistrations()).toHaveLength(1);
  });

  it("should fail on equally specific matches", async () => {
    const mapping = new RequestMappingHandlerMapping()
      .register({ path: "/items/{id}" }, itemById)
      .register({ path: "/items/{name}" }, itemByName);

    await expect(mapping.getHandler(mockRequest("GET", "/items/x"))).rejects.toThrow(
      "Ambiguous handler methods mapped for GET /items/x: {itemById, itemByName}",
    );
  });

  it("should let a query parameter condition break the tie", async () => {
    const mapping = new RequestMappingHandlerMapping()
      .register({ path: "/items/{id}" }, itemById)
      .register({ path: "/items/{name}", params: ["byName"] }, itemByName);

    const chain = await mapping.getHandler(mockRequest("GET", "/items/x", { query: { byName: "1" } }));

    expect(chain?.handler).toBe(itemByName);
  });

  // ----------------------------------------------------------------
  // Chain assembly
  // ----------------------------------------------------------------

  it("should fall back to the default handler", async () => {
    const mapping = new RequestMappingHandlerMapping({ defaultHandler: itemById });

    const chain = await mapping.getHandler(mockRequest("GET", "/unknown"));

    expect(chain?.handler).toBe(itemById);
  });

  it("should add plain interceptors always and mapped ones for matching paths", async () => {
    // Arrange
    const audit = recordingInterceptor("audit", []);
    const admin = recordingInterceptor("admin", []);
    const mapping = new RequestMappingHandlerMapping({
      interceptors: [audit, MappedInterceptor.forPaths(["/admin/**"], admin)],
    })
      .register({ path: "/accounts" }, itemById)
      .register({ path: "/admin/users" }, itemByName);

    // Act
    const accounts = await mapping.getHandler(mockRequest("GET", "/accounts"));
    const users = await mapping.getHandler(mockRequest("GET", "/admin/users"));

    // Assert
    expect(accounts?.interceptors).toEqual([audit]);
    expect(users?.interceptors).toEqual([audit, admin]);
  });

  // ----------------------------------------------------------------
  // Partial matches
  // ----------------------------------------------------------------

  function accountsMapping(reportPartialMatches: boolean): RequestMappingHandlerMapping {
    return new RequestMappingHandlerMapping({ reportPartialMatches })
      .register({ path: "/accounts", method: "GET" }, itemById)
      .register({ path: "/accounts", method: "POST", consumes: ["application/json"] }, itemByName);
  }

  it("should reject a mapped path requested with another method as a 405", async () => {
    const mapping = accountsMapping(true);

    await expect(mapping.getHandler(mockRequest("DELETE", "/accounts"))).rejects.toMatchObject({
      statusCode: 405,
      allowedMethods: ["GET", "POST"],
      headers: { allow: "GET, POST" },
    });
  });

  it("should reject an unsupported content type as a 415", async () => {
    const mapping = accountsMapping(true);
    const request = mockRequest("POST", "/accounts", { contentType: "text/plain" });

    await expect(mapping.getHandler(request)).rejects.toMatchObject({
      statusCode: 415,
      message: 'Content type "text/plain" is not supported',
      headers: { accept: "application/json" },
    });
  });

  it("should still return null for unmapped paths", async () => {
    const mapping = accountsMapping(true);

    expect(await mapping.getHandler(mockRequest("GET", "/reports"))).toBeNull();
  });

  it("should fall through on partial matches unless asked to report them", async () => {
    const mapping = accountsMapping(false);

    expect(await mapping.getHandler(mockRequest("DELETE", "/accounts"))).toBeNull();
  });
});
