import { describe, it, expect } from "vitest";
import { UrlFilenameViewController } from "../../src/mvc/url-filename-view-controller";
import { isController } from "../../src/mvc/controller";
import { BEST_MATCHING_PATTERN } from "../../src/handlers/mapping/attributes";
import { FlashMap } from "../../src/flash/flash-map";
import { INPUT_FLASH_MAP } from "../../src/flash/flash-map-manager";
import { mockRequest } from "../../src/testing/mock-http";

describe("UrlFilenameViewController", () => {
  it("should name the view after the path", () => {
    const controller = new UrlFilenameViewController({ prefix: "pages/", suffix: ".html" });

    expect(controller.getViewName(mockRequest("GET", "/docs/intro.txt"))).toBe("pages/docs/intro.html");
  });

  it("should strip the literal part of the matched pattern", () => {
    const controller = new UrlFilenameViewController({ stripMappedPrefix: true });
    const request = mockRequest("GET", "/docs/guides/setup");
    BEST_MATCHING_PATTERN.set(request, "/docs/**");

    expect(controller.getViewName(request)).toBe("guides/setup");
  });

  it("should render with the flashed attributes", () => {
    const request = mockRequest("GET", "/welcome");
    INPUT_FLASH_MAP.set(request, new FlashMap().set("message", "hi"));

    const result = new UrlFilenameViewController().handleRequest(request);

    expect(result.viewName).toBe("welcome");
    expect(result.model).toEqual({ message: "hi" });
  });

  it("should be a controller", () => {
    expect(isController(new UrlFilenameViewController())).toBe(true);
  });
});
