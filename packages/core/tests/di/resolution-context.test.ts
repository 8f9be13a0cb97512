import { describe, it, expect } from "vitest";
import { ResolutionContext } from "../../src/di/resolution-context";
import { CircularDependencyError } from "../../src/errors/container-errors";

describe("ResolutionContext", () => {
  it("starts empty", () => {
    // Arrange
    const context = new ResolutionContext();

    // Assert
    expect(context.chain).toEqual([]);
    expect(context.breadcrumb()).toBe("(root)");
  });

  it("tracks the ids under construction, outermost first", () => {
    // Arrange
    const context = new ResolutionContext();

    // Act
    context.push("UserService");
    context.push("Database");

    // Assert
    expect(context.chain).toEqual(["UserService", "Database"]);
    expect(context.breadcrumb()).toBe("UserService -> Database");
  });

  it("throws CircularDependencyError when an id is pushed twice", () => {
    // Arrange
    const context = new ResolutionContext();
    context.push("A");
    context.push("B");

    // Act & Assert
    expect(() => context.push("A")).toThrow(CircularDependencyError);
    expect(() => context.push("A")).toThrow("Circular dependency detected: A -> B -> A");
    expect(context.chain).toEqual(["A", "B"]);
  });

  it("pops the frame when the callback throws", () => {
    // Arrange
    const context = new ResolutionContext();

    // Act
    expect(() =>
      context.within("Failing", () => {
        throw new Error("nope");
      }),
    ).toThrow("nope");

    // Assert
    expect(context.chain).toEqual([]);
  });

  it("returns the callback result and pops the frame", () => {
    // Arrange
    const context = new ResolutionContext();
    let inside: readonly string[] = [];

    // Act
    const result = context.within("Service", () => {
      inside = context.chain;
      return 42;
    });

    // Assert
    expect(result).toBe(42);
    expect(inside).toEqual(["Service"]);
    expect(context.chain).toEqual([]);
  });

  it("hands out copies of the chain", () => {
    // Arrange
    const context = new ResolutionContext();
    context.push("A");
    const snapshot = context.chain;

    // Act
    context.push("B");

    // Assert
    expect(snapshot).toEqual(["A"]);
  });
});
