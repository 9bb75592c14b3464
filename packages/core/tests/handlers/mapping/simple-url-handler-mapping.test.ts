import { describe, it, expect, afterEach } from "vitest";
import { SimpleUrlHandlerMapping } from "../../../src/handlers/mapping/simple-url-handler-mapping";
import { BEST_MATCHING_PATTERN, URI_TEMPLATE_VARIABLES } from "../../../src/handlers/mapping/attributes";
import { mockRequest } from "../../../src/testing/mock-http";

const home = { name: "home" };
const docs = { name: "docs" };
const docPage = { name: "docPage" };
const fallback = { name: "fallback" };

function mapping(trailingSlashMatch = true): SimpleUrlHandlerMapping {
  return new SimpleUrlHandlerMapping(
    {
      "/": home,
      docs,
      "/docs/{page}": docPage,
      "/**": fallback,
    },
    { trailingSlashMatch },
  );
}

describe("SimpleUrlHandlerMapping", () => {
  it("should add a leading slash to registered paths", () => {
    expect([...mapping().getHandlerMap().keys()]).toEqual(["/", "/docs", "/docs/{page}", "/**"]);
  });

  it("should prefer an exact path", async () => {
    const request = mockRequest("GET", "/docs");

    const chain = await mapping().getHandler(request);

    expect(chain?.handler).toBe(docs);
    expect(BEST_MATCHING_PATTERN.get(request)).toBe("/docs");
  });

  it("should fall back to the path without its trailing slash", async () => {
    expect((await mapping().getHandler(mockRequest("GET", "/docs/")))?.handler).toBe(docs);
  });

  it("should match nothing with a trailing slash when matching is strict", async () => {
    expect(await mapping(false).getHandler(mockRequest("GET", "/docs/"))).toBeNull();
  });

  describe("trailing slash default", () => {
    const original = process.env.SWITCHYARD_TRAILING_SLASH_MATCH;

    afterEach(() => {
      if (original === undefined) delete process.env.SWITCHYARD_TRAILING_SLASH_MATCH;
      else process.env.SWITCHYARD_TRAILING_SLASH_MATCH = original;
    });

    it("should take strict matching from the environment when the option is unset", async () => {
      process.env.SWITCHYARD_TRAILING_SLASH_MATCH = "false";
      const strict = new SimpleUrlHandlerMapping({ "/docs": docs });

      expect(await strict.getHandler(mockRequest("GET", "/docs/"))).toBeNull();
      expect((await strict.getHandler(mockRequest("GET", "/docs")))?.handler).toBe(docs);
    });

    it("should let the option win over the environment", async () => {
      process.env.SWITCHYARD_TRAILING_SLASH_MATCH = "false";
      const lenient = new SimpleUrlHandlerMapping({ "/docs": docs }, { trailingSlashMatch: true });

      expect((await lenient.getHandler(mockRequest("GET", "/docs/")))?.handler).toBe(docs);
    });
  });

  it("should pick the most specific pattern and expose its variables", async () => {
    // Arrange
    const request = mockRequest("GET", "/docs/getting-started");

    // Act
    const chain = await mapping().getHandler(request);

    // Assert
    expect(chain?.handler).toBe(docPage);
    expect(URI_TEMPLATE_VARIABLES.get(request)).toEqual({ page: "getting-started" });
  });

  it("should use the catch-all pattern last", async () => {
    expect((await mapping().getHandler(mockRequest("GET", "/a/b/c")))?.handler).toBe(fallback);
  });

  it("should reject a second handler for the same path", () => {
    expect(() => mapping().registerHandler("/docs", fallback)).toThrow(
      'Cannot map Object to URL path "/docs": Object is already mapped there',
    );
  });
});
