import "reflect-metadata";
import { describe, it, expect, beforeEach } from "vitest";
import { Container } from "../../src/di/container";
import { Method } from "../../src/decorators/injectable";
import { defineFunction, defineMethod, defineType, param } from "../../src/metadata/descriptors";
import {
  ContainerError,
  NotInstantiableError,
  ParameterResolutionError,
} from "../../src/errors/container-errors";

// ---------------------------------------------------------------------------
// Test controllers
// ---------------------------------------------------------------------------

class Request {
  readonly headers = new Map<string, string>();
}

class PostsController {
  index(request: Request): Request {
    return request;
  }

  show(request: Request, id: string): { request: Request; id: string } {
    return { request, id };
  }

  ping(): string {
    return "pong";
  }

  untyped(value: unknown): unknown {
    return value;
  }
}
defineMethod(PostsController, "index", [param.ref("request", Request)]);
defineMethod(PostsController, "show", [param.ref("request", Request), param.string("id")]);

class EnvController {
  @Method(param.string("env"))
  current(env: string): string {
    return env;
  }
}

class Dependency {}

class StatefulController {
  constructor(public readonly dependency?: Dependency) {}

  hasDependency(): boolean {
    return this.dependency !== undefined;
  }
}
defineType(StatefulController, { params: [param.ref("dependency", Dependency)] });

class Counter {
  count = 0;

  increment(step: number): number {
    this.count += step;
    return this.count;
  }
}
defineMethod(Counter, "increment", [param.number("step", { default: 1 })]);

abstract class AbstractHandler {
  handle(): string {
    return "handled";
  }
}
defineType(AbstractHandler, { kind: "abstract" });

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe("Invoker", () => {
  let container: Container;

  beforeEach(() => {
    container = new Container();
  });

  // -----------------------------------------------------------------------
  // invokeMethod
  // -----------------------------------------------------------------------

  describe("invokeMethod", () => {
    it("injects class-typed method parameters", () => {
      // Act
      const result = container.invokeMethod(PostsController, "index");

      // Assert
      expect(result).toBeInstanceOf(Request);
    });

    it("injects the shared instance of a singleton parameter", () => {
      // Arrange
      container.singleton(Request);
      const request = container.get(Request);

      // Act
      const result = container.invokeMethod(PostsController, "index");

      // Assert
      expect(result).toBe(request);
    });

    it("takes named overrides before resolving the rest", () => {
      // Arrange
      const request = new Request();

      // Act
      const result = container.invokeMethod(PostsController, "show", { request, id: "42" });

      // Assert
      expect(result).toEqual({ request, id: "42" });
    });

    it("mixes overrides with resolved parameters", () => {
      // Act
      const result = container.invokeMethod(PostsController, "show", { id: "7" });

      // Assert
      expect(result).toMatchObject({ id: "7" });
      expect((result as { request: unknown }).request).toBeInstanceOf(Request);
    });

    it("resolves a scalar parameter from the binding named after it", () => {
      // Arrange
      container.set("env", "staging");

      // Act & Assert
      expect(container.invokeMethod(EnvController, "current")).toBe("staging");
    });

    it("lets an override win over a binding of the same name", () => {
      // Arrange
      container.set("env", "staging");

      // Act & Assert
      expect(container.invokeMethod(EnvController, "current", { env: "production" })).toBe("production");
    });

    it("accepts an override whose value is undefined", () => {
      // Act & Assert
      expect(container.invokeMethod(EnvController, "current", { env: undefined })).toBeUndefined();
    });

    it("fails for a scalar with no override, binding or default", () => {
      // Act & Assert
      expect(() => container.invokeMethod(EnvController, "current")).toThrow(ParameterResolutionError);
      expect(() => container.invokeMethod(EnvController, "current")).toThrow(
        "Cannot resolve parameter 'env' of EnvController.current(): " +
          "no binding named 'env' for this string parameter and no default value",
      );
    });

    it("calls methods on a given instance", () => {
      // Arrange
      const counter = new Counter();
      counter.count = 10;

      // Act
      const result = container.invokeMethod(counter, "increment", { step: 5 });

      // Assert
      expect(result).toBe(15);
      expect(counter.count).toBe(15);
    });

    it("uses the bound singleton as the receiver", () => {
      // Arrange
      container.singleton(Counter);

      // Act
      container.invokeMethod(Counter, "increment");
      container.invokeMethod("Counter", "increment");

      // Assert
      expect(container.get(Counter).count).toBe(2);
    });

    it("constructs an unbound receiver without resolving its dependencies", () => {
      // Act & Assert
      expect(container.invokeMethod(StatefulController, "hasDependency")).toBe(false);
    });

    it("calls a method that takes no parameters without a descriptor", () => {
      // Act & Assert
      expect(container.invokeMethod(PostsController, "ping")).toBe("pong");
    });

    it("rejects a method with parameters and no descriptor", () => {
      // Act & Assert
      expect(() => container.invokeMethod(PostsController, "untyped")).toThrow(
        "PostsController.untyped() takes 1 parameter(s) but has no parameter descriptor. " +
          "Declare them with @Method(), defineMethod() or defineFunction().",
      );
    });

    it("fails for a class name that is not known", () => {
      // Act & Assert
      expect(() => container.invokeMethod("MissingController", "index")).toThrow(ContainerError);
      expect(() => container.invokeMethod("MissingController", "index")).toThrow(
        "Class MissingController does not exist.",
      );
    });

    it("fails for a method that does not exist", () => {
      // Act & Assert
      expect(() => container.invokeMethod(PostsController, "destroy")).toThrow(
        "Method destroy does not exist in class PostsController.",
      );
    });

    it("refuses to construct an abstract receiver", () => {
      // Act & Assert
      expect(() => container.invokeMethod(AbstractHandler, "handle")).toThrow(NotInstantiableError);
    });

    it("propagates what the method throws unchanged", () => {
      // Arrange
      const failure = new Error("handler failed");
      const receiver = {
        run(): never {
          throw failure;
        },
      };

      // Act & Assert
      expect(() => container.invokeMethod(receiver, "run")).toThrow(failure);
    });
  });

  // -----------------------------------------------------------------------
  // invokeFunction
  // -----------------------------------------------------------------------

  describe("invokeFunction", () => {
    it("fills parameters from overrides and defaults", () => {
      // Arrange
      const greet = defineFunction(
        (count = 10, name = "foo") => ({ count, name }),
        [param.number("count", { default: 10 }), param.string("name", { default: "foo" })],
      );

      // Act
      const result = container.invokeFunction(greet, { name: "bar" });

      // Assert
      expect(result).toEqual({ count: 10, name: "bar" });
    });

    it("injects class-typed parameters", () => {
      // Arrange
      const handler = defineFunction((request: Request) => request, [param.ref("request", Request)]);

      // Act & Assert
      expect(container.invokeFunction(handler)).toBeInstanceOf(Request);
    });

    it("resolves scalars from bindings named after the parameter", () => {
      // Arrange
      container.set("region", "eu-west-1");
      const handler = defineFunction((region: string) => region.toUpperCase(), [param.string("region")]);

      // Act & Assert
      expect(container.invokeFunction(handler)).toBe("EU-WEST-1");
    });

    it("calls a function with no parameters without a descriptor", () => {
      // Act & Assert
      expect(container.invokeFunction(() => "done")).toBe("done");
    });

    it("rejects a function with parameters and no descriptor", () => {
      // Arrange
      function greet(name: string): string {
        return `hello ${name}`;
      }

      // Act & Assert
      expect(() => container.invokeFunction(greet)).toThrow(
        "function greet() takes 1 parameter(s) but has no parameter descriptor. " +
          "Declare them with @Method(), defineMethod() or defineFunction().",
      );
    });

    it("rejects union-typed parameters", () => {
      // Arrange
      const handler = defineFunction(
        function handle(input: unknown) {
          return input;
        },
        [param.union("input", ["string", "number"])],
      );

      // Act & Assert
      expect(() => container.invokeFunction(handler)).toThrow(
        "Cannot resolve parameter 'input' of function handle(): union types are not supported (string | number)",
      );
    });
  });
});
