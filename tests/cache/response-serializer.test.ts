import { describe, it, expect } from "vitest";
import { ResponseSerializer } from "../../src/cache/response-serializer.js";
import { makeResponse } from "../support/http.js";

describe("ResponseSerializer", () => {
  const serializer = new ResponseSerializer();

  it("serializes a response into a cacheable record", () => {
    const response = makeResponse(200, '[{"id":1}]', { "content-type": "application/json" }, "OK");

    expect(serializer.serialize(response)).toEqual({
      cacheable: true,
      status: 200,
      statusText: "OK",
      headers: { "content-type": "application/json" },
      body: '[{"id":1}]',
    });
    expect(serializer.deserialize(serializer.serialize(response))).toEqual(response);
  });

  it("marks oversized bodies as not cacheable", () => {
    const small = new ResponseSerializer(4);
    const record = small.serialize(makeResponse(200, "12345"));

    expect(record).toEqual({ cacheable: false, reason: "Response too large" });
    expect(small.deserialize(record)).toBeNull();
  });

  it("fills defaults for missing optional fields", () => {
    expect(serializer.deserialize({ cacheable: true, status: 204 })).toEqual({
      status: 204,
      statusText: "",
      headers: {},
      body: "",
    });
  });

  it("rejects records that are not cached responses", () => {
    expect(serializer.deserialize("junk")).toBeNull();
    expect(serializer.deserialize({ cacheable: true, status: "200" })).toBeNull();
    expect(serializer.deserialize({ cacheable: true, status: 200, headers: { a: 1 } })).toBeNull();
  });
});
