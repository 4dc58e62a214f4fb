import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { OAuth2RefreshMiddleware } from "../../src/middleware/oauth-refresh.js";
import { ApiKeyCredentials, type RefreshableCredentialSource } from "../../src/auth/credentials.js";
import { setLogLevel } from "../../src/utils/logger.js";
import { fakeHandler, httpError, makeRequest, makeResponse } from "../support/http.js";

class FakeOAuthSource implements RefreshableCredentialSource {
  readonly authMode = "oauth" as const;
  token = "old-token";
  expired = false;
  failRefresh = false;
  refreshCalls = 0;

  getCredential(): string | undefined {
    return this.token;
  }

  isExpired(): boolean {
    return this.expired;
  }

  async refreshToken(): Promise<string> {
    this.refreshCalls++;
    if (this.failRefresh) {
      throw new Error("refresh endpoint down");
    }
    this.token = "new-token";
    this.expired = false;
    return this.token;
  }
}

describe("OAuth2RefreshMiddleware", () => {
  let source: FakeOAuthSource;
  const request = makeRequest("GET", "/api/v1/users/self", { Authorization: "Bearer old-token" });
  const unauthorized = () => httpError(makeResponse(401, '{"errors":[{"message":"Invalid access token."}]}'));

  beforeEach(() => {
    setLogLevel("ERROR");
    source = new FakeOAuthSource();
  });

  afterEach(() => {
    setLogLevel("INFO");
  });

  it("passes requests through untouched for non-OAuth credentials", async () => {
    const next = fakeHandler().mockRejectedValue(unauthorized());
    const handler = new OAuth2RefreshMiddleware(new ApiKeyCredentials("test-key")).handler()(next);

    await expect(handler(request, {})).rejects.toThrow("API error (401)");

    expect(next).toHaveBeenCalledTimes(1);
    expect(next.mock.calls[0][0]).toBe(request);
  });

  it("refreshes an expired token before sending", async () => {
    source.expired = true;
    const next = fakeHandler().mockResolvedValue(makeResponse(200));
    const handler = new OAuth2RefreshMiddleware(source).handler()(next);

    await handler(request, {});

    expect(source.refreshCalls).toBe(1);
    expect(next.mock.calls[0][0].headers).toEqual({ Authorization: "Bearer new-token" });
  });

  it("sends the original request when the proactive refresh fails", async () => {
    source.expired = true;
    source.failRefresh = true;
    const next = fakeHandler().mockResolvedValue(makeResponse(200));
    const handler = new OAuth2RefreshMiddleware(source, { retryOn401: false }).handler()(next);

    const response = await handler(request, {});

    expect(response.status).toBe(200);
    expect(next.mock.calls[0][0]).toBe(request);
  });

  it("refreshes and retries exactly once after a 401", async () => {
    const next = fakeHandler().mockRejectedValueOnce(unauthorized()).mockResolvedValueOnce(makeResponse(200));
    const handler = new OAuth2RefreshMiddleware(source).handler()(next);

    const response = await handler(request, {});

    expect(response.status).toBe(200);
    expect(source.refreshCalls).toBe(1);
    expect(next).toHaveBeenCalledTimes(2);
    expect(next.mock.calls[1][0].headers).toEqual({ Authorization: "Bearer new-token" });
  });

  it("surfaces a second 401 instead of looping", async () => {
    const second = unauthorized();
    const next = fakeHandler().mockRejectedValueOnce(unauthorized()).mockRejectedValueOnce(second);
    const handler = new OAuth2RefreshMiddleware(source).handler()(next);

    await expect(handler(request, {})).rejects.toBe(second);

    expect(source.refreshCalls).toBe(1);
    expect(next).toHaveBeenCalledTimes(2);
  });

  it("surfaces the original 401 when the refresh fails", async () => {
    source.failRefresh = true;
    const original = unauthorized();
    const next = fakeHandler().mockRejectedValue(original);
    const handler = new OAuth2RefreshMiddleware(source).handler()(next);

    await expect(handler(request, {})).rejects.toBe(original);
    expect(next).toHaveBeenCalledTimes(1);
  });

  it("does not react to 401 when retryOn401 is off", async () => {
    const original = unauthorized();
    const next = fakeHandler().mockRejectedValue(original);
    const handler = new OAuth2RefreshMiddleware(source, { retryOn401: false }).handler()(next);

    await expect(handler(request, {})).rejects.toBe(original);
    expect(source.refreshCalls).toBe(0);
  });

  it("leaves other failures alone", async () => {
    const forbidden = httpError(makeResponse(403, "forbidden"));
    const next = fakeHandler().mockRejectedValue(forbidden);
    const handler = new OAuth2RefreshMiddleware(source).handler()(next);

    await expect(handler(request, {})).rejects.toBe(forbidden);
    expect(source.refreshCalls).toBe(0);
  });

  it("skips the proactive refresh when autoRefresh is off", async () => {
    source.expired = true;
    const next = fakeHandler().mockResolvedValue(makeResponse(200));
    const handler = new OAuth2RefreshMiddleware(source, { autoRefresh: false }).handler()(next);

    await handler(request, {});

    expect(source.refreshCalls).toBe(0);
    expect(next.mock.calls[0][0]).toBe(request);
  });
});
