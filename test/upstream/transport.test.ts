import { describe, it, mock, afterEach } from "node:test";
import assert from "node:assert/strict";
import { PokeApiTransport } from "../../src/upstream/transport";
import { PIKACHU_BODY } from "../helpers/stubs";

afterEach(() => {
  mock.restoreAll();
});

describe("PokeApiTransport", () => {
  it("builds the lookup URL under the base URL", () => {
    const transport = new PokeApiTransport({ baseUrl: "https://pokeapi.example/api/v2/", timeoutMs: 1000 });
    assert.equal(transport.urlFor("pikachu"), "https://pokeapi.example/api/v2/pokemon/pikachu");
  });

  it("percent-encodes the key", () => {
    const transport = new PokeApiTransport({ baseUrl: "https://pokeapi.example/api/v2", timeoutMs: 1000 });
    assert.equal(transport.urlFor("mr mime/../x"), "https://pokeapi.example/api/v2/pokemon/mr%20mime%2F..%2Fx");
  });

  it("returns the raw status and body", async () => {
    const fetchMock = mock.method(
      globalThis,
      "fetch",
      async (_input: string | URL | Request) => new Response(PIKACHU_BODY, { status: 200 }),
    );
    const transport = new PokeApiTransport({ baseUrl: "https://pokeapi.example/api/v2", timeoutMs: 1000 });

    const res = await transport.request("pikachu");

    assert.deepEqual(res, { status: 200, body: PIKACHU_BODY });
    assert.equal(fetchMock.mock.callCount(), 1);
    assert.equal(String(fetchMock.mock.calls[0]?.arguments[0]), "https://pokeapi.example/api/v2/pokemon/pikachu");
  });

  it("resolves error statuses instead of throwing", async () => {
    mock.method(globalThis, "fetch", async () => new Response("Not Found", { status: 404 }));
    const transport = new PokeApiTransport({ baseUrl: "https://pokeapi.example/api/v2", timeoutMs: 1000 });

    assert.deepEqual(await transport.request("missingno"), { status: 404, body: "Not Found" });
  });
});
