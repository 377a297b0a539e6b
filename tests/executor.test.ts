// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
import { describe, it, expect, vi, type Mock } from "vitest";
import { createFhirExecutor, formatOutcomeIssues, mergeHeaders } from "../src/fhir/executor.js";
import { FhirOperationError, HttpError } from "../src/errors.js";

const credentials = { accessKeyId: "test-access-key", secretAccessKey: "test-secret" };
const URL_42 = "https://x.example.com/y/Patient/42";

function executorReturning(build: () => Response) {
  const fetchMock = vi.fn<typeof fetch>();
  fetchMock.mockImplementation(async () => build());
  const execute = createFhirExecutor({ credentials, fetch: fetchMock });
  return { execute, fetchMock };
}

function sentHeaders(fetchMock: Mock<typeof fetch>): Headers {
  return new Headers(fetchMock.mock.calls[0]![1]?.headers);
}

// ---------------------------------------------------------------------------
// Success responses
// ---------------------------------------------------------------------------

describe("createFhirExecutor — success", () => {
  it("returns the decoded JSON body", async () => {
    const { execute } = executorReturning(
      () => new Response(JSON.stringify({ resourceType: "Patient", id: "42" }), { status: 200 }),
    );
    const result = await execute({ method: "GET", url: URL_42, region: "us-east-1" });
    expect(result).toEqual({ resourceType: "Patient", id: "42" });
  });

  it("returns a success marker for an empty 204", async () => {
    const { execute } = executorReturning(() => new Response(null, { status: 204 }));
    const result = await execute({ method: "DELETE", url: URL_42, region: "us-east-1" });
    expect(result).toEqual({ status: "success", statusCode: 204 });
  });

  it("returns a success marker for an empty 200", async () => {
    const { execute } = executorReturning(() => new Response("", { status: 200 }));
    const result = await execute({ method: "DELETE", url: URL_42, region: "us-east-1" });
    expect(result).toEqual({ status: "success", statusCode: 200 });
  });

  it("rejects a successful body that is not a JSON object", async () => {
    const { execute } = executorReturning(() => new Response("[1,2]", { status: 200 }));
    await expect(execute({ method: "GET", url: URL_42, region: "us-east-1" })).rejects.toThrow(HttpError);
  });

  it("raises HttpError with the status for a successful body that is not JSON", async () => {
    const { execute } = executorReturning(() => new Response("<html>ok</html>", { status: 200 }));

    const err = await execute({ method: "GET", url: URL_42, region: "us-east-1" }).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(HttpError);
    expect((err as HttpError).statusCode).toBe(200);
    expect((err as HttpError).body).toBe("<html>ok</html>");
    expect((err as HttpError).message).toBe("Unexpected FHIR response body (HTTP 200): <html>ok</html>");
  });
});

// ---------------------------------------------------------------------------
// Request construction
// ---------------------------------------------------------------------------

describe("createFhirExecutor — request", () => {
  it("sends FHIR content negotiation headers by default", async () => {
    const { execute, fetchMock } = executorReturning(() => new Response("{}", { status: 200 }));
    await execute({ method: "GET", url: URL_42, region: "us-east-1" });

    const headers = sentHeaders(fetchMock);
    expect(headers.get("content-type")).toBe("application/fhir+json");
    expect(headers.get("accept")).toBe("application/fhir+json");
  });

  it("lets caller headers override the defaults", async () => {
    const { execute, fetchMock } = executorReturning(() => new Response("{}", { status: 200 }));
    await execute({
      method: "PATCH",
      url: URL_42,
      region: "us-east-1",
      body: [{ op: "replace", path: "/active", value: false }],
      headers: { "Content-Type": "application/json-patch+json" },
    });

    const headers = sentHeaders(fetchMock);
    expect(headers.get("content-type")).toBe("application/json-patch+json");
    expect(headers.get("accept")).toBe("application/fhir+json");
  });

  it("signs with SigV4 for the healthlake service and region", async () => {
    const { execute, fetchMock } = executorReturning(() => new Response("{}", { status: 200 }));
    await execute({ method: "GET", url: URL_42, region: "us-east-1" });

    const authorization = sentHeaders(fetchMock).get("authorization");
    expect(authorization).toMatch(
      /^AWS4-HMAC-SHA256 Credential=test-access-key\/\d{8}\/us-east-1\/healthlake\/aws4_request, SignedHeaders=/,
    );
    expect(sentHeaders(fetchMock).get("x-amz-date")).toMatch(/^\d{8}T\d{6}Z$/);
  });

  it("does not forward the signed host header to fetch", async () => {
    const { execute, fetchMock } = executorReturning(() => new Response("{}", { status: 200 }));
    await execute({ method: "GET", url: URL_42, region: "us-east-1" });
    expect(sentHeaders(fetchMock).has("host")).toBe(false);
  });

  it("sends the method and JSON body", async () => {
    const { execute, fetchMock } = executorReturning(() => new Response("{}", { status: 201 }));
    const body = { resourceType: "Patient", name: [{ family: "Doe" }] };
    await execute({ method: "POST", url: "https://x.example.com/y/Patient", region: "us-east-1", body });

    const init = fetchMock.mock.calls[0]![1];
    expect(init?.method).toBe("POST");
    expect(init?.body).toBe(JSON.stringify(body));
  });

  it("sends no body when none is given", async () => {
    const { execute, fetchMock } = executorReturning(() => new Response("{}", { status: 200 }));
    await execute({ method: "GET", url: URL_42, region: "us-east-1" });
    expect(fetchMock.mock.calls[0]![1]?.body).toBeUndefined();
  });

  it("encodes query parameters, repeating array values", async () => {
    const { execute, fetchMock } = executorReturning(() => new Response("{}", { status: 200 }));
    await execute({
      method: "GET",
      url: "https://x.example.com/y/Patient",
      region: "us-east-1",
      query: { name: "Smith", _include: ["Patient:general-practitioner", "Patient:organization"] },
    });

    const target = new URL(String(fetchMock.mock.calls[0]![0]));
    expect(target.origin + target.pathname).toBe("https://x.example.com/y/Patient");
    expect(target.searchParams.get("name")).toBe("Smith");
    expect(target.searchParams.getAll("_include")).toEqual([
      "Patient:general-practitioner",
      "Patient:organization",
    ]);
  });

  it("requests the URL unchanged when there is no query", async () => {
    const { execute, fetchMock } = executorReturning(() => new Response("{}", { status: 200 }));
    await execute({ method: "GET", url: URL_42, region: "us-east-1" });
    expect(fetchMock.mock.calls[0]![0]).toBe(URL_42);
  });

  it("sends each request exactly once", async () => {
    const { execute, fetchMock } = executorReturning(() => new Response("", { status: 500 }));
    await execute({ method: "GET", url: URL_42, region: "us-east-1" }).catch(() => undefined);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });
});

// ---------------------------------------------------------------------------
// Failure normalization
// ---------------------------------------------------------------------------

describe("createFhirExecutor — failures", () => {
  it("flattens an OperationOutcome into FhirOperationError", async () => {
    const outcome = {
      resourceType: "OperationOutcome",
      issue: [{ severity: "error", code: "invalid", diagnostics: "bad input" }],
    };
    const { execute } = executorReturning(() => new Response(JSON.stringify(outcome), { status: 400 }));

    const err = await execute({ method: "POST", url: URL_42, region: "us-east-1" }).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(FhirOperationError);
    expect((err as FhirOperationError).message).toContain("ERROR: invalid - bad input");
    expect((err as FhirOperationError).statusCode).toBe(400);
  });

  it("joins several issues with '; ' and prefers details.text", async () => {
    const outcome = {
      resourceType: "OperationOutcome",
      issue: [
        { severity: "error", code: "required", details: { text: "name is required" }, diagnostics: "ignored" },
        { severity: "warning", code: "informational" },
      ],
    };
    const { execute } = executorReturning(() => new Response(JSON.stringify(outcome), { status: 422 }));

    const err = await execute({ method: "PUT", url: URL_42, region: "us-east-1" }).catch((e: unknown) => e);
    expect((err as FhirOperationError).issues).toEqual([
      "ERROR: required - name is required",
      "WARNING: informational - No details",
    ]);
    expect((err as FhirOperationError).message).toBe(
      "FHIR operation failed: ERROR: required - name is required; WARNING: informational - No details",
    );
  });

  it("raises HttpError with the raw text for non-OperationOutcome JSON", async () => {
    const { execute } = executorReturning(
      () => new Response('{"message":"Forbidden"}', { status: 403 }),
    );

    const err = await execute({ method: "GET", url: URL_42, region: "us-east-1" }).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(HttpError);
    expect((err as HttpError).statusCode).toBe(403);
    expect((err as HttpError).message).toBe('HTTP error 403: {"message":"Forbidden"}');
  });

  it("raises a status-bearing HttpError for a non-JSON body", async () => {
    const { execute } = executorReturning(
      () => new Response("<html>Bad Gateway</html>", { status: 502, statusText: "Bad Gateway" }),
    );

    const err = await execute({ method: "GET", url: URL_42, region: "us-east-1" }).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(HttpError);
    expect((err as HttpError).statusCode).toBe(502);
    expect((err as HttpError).message).toBe(`HTTP 502 Bad Gateway for url: ${URL_42}`);
  });

  it("propagates transport failures", async () => {
    const fetchMock = vi.fn<typeof fetch>();
    fetchMock.mockRejectedValue(new TypeError("fetch failed"));
    const execute = createFhirExecutor({ credentials, fetch: fetchMock });
    await expect(execute({ method: "GET", url: URL_42, region: "us-east-1" })).rejects.toThrow("fetch failed");
  });
});

describe("mergeHeaders", () => {
  it("lowercases names so a caller value replaces the default", () => {
    expect(mergeHeaders({ ACCEPT: "application/json", "X-Trace": "abc" })).toEqual({
      "content-type": "application/fhir+json",
      accept: "application/json",
      "x-trace": "abc",
    });
  });
});

describe("formatOutcomeIssues", () => {
  it("fills unknown severity and code", () => {
    expect(formatOutcomeIssues([{ diagnostics: "boom" }])).toEqual(["UNKNOWN: unknown - boom"]);
  });
});
