import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import {
  KeystoneAuthProvider,
  assertCredentials,
  credentialsFromEnv,
  findCatalogEndpoint,
  resolveCredentials,
  type CatalogEntry,
} from "./index.js";
import { AuthenticationError, NotFoundError } from "../errors.js";

const mockFetch = vi.fn<typeof fetch>();

beforeEach(() => {
  vi.stubGlobal("fetch", mockFetch);
  mockFetch.mockReset();
});

afterEach(() => {
  vi.unstubAllGlobals();
});

const env = {
  OS_AUTH_URL: "http://keystone.test:5000/v2.0",
  OS_USERNAME: "admin",
  OS_PASSWORD: "test-secret",
  OS_TENANT_NAME: "admin",
};

// =============================================================================
// Credential resolution
// =============================================================================

describe("credentialsFromEnv", () => {
  it("reads the OS_* variables", () => {
    expect(credentialsFromEnv(env)).toEqual({
      authUrl: "http://keystone.test:5000/v2.0",
      username: "admin",
      password: "test-secret",
      tenantName: "admin",
    });
  });

  it("falls back to OS_PROJECT_NAME", () => {
    expect(credentialsFromEnv({ OS_PROJECT_NAME: "demo" }).tenantName).toBe("demo");
  });
});

describe("resolveCredentials", () => {
  it("lets explicit params win field by field", () => {
    expect(resolveCredentials({ username: "ops", project_name: "infra" }, env)).toEqual({
      authUrl: "http://keystone.test:5000/v2.0",
      username: "ops",
      password: "test-secret",
      tenantName: "infra",
    });
  });
});

describe("assertCredentials", () => {
  it("names every missing field", () => {
    expect(() =>
      assertCredentials({ authUrl: "http://keystone.test", username: "", password: "", tenantName: " " }),
    ).toThrow(
      new AuthenticationError(
        "Missing OpenStack credentials: username (OS_USERNAME), password (OS_PASSWORD), project_name (OS_TENANT_NAME)",
      ),
    );
  });
});

// =============================================================================
// Catalog
// =============================================================================

describe("findCatalogEndpoint", () => {
  const catalog: CatalogEntry[] = [
    {
      type: "orchestration",
      endpoints: [
        { region: "RegionOne", publicURL: "http://heat-one.test", adminURL: "http://heat-one.admin" },
        { region: "RegionTwo", publicURL: "http://heat-two.test" },
      ],
    },
  ];

  it("picks the public URL of the first endpoint by default", () => {
    expect(findCatalogEndpoint(catalog, "orchestration")).toBe("http://heat-one.test");
  });

  it("filters by region and interface", () => {
    expect(findCatalogEndpoint(catalog, "orchestration", { region: "RegionTwo" })).toBe("http://heat-two.test");
    expect(findCatalogEndpoint(catalog, "orchestration", { interface: "admin" })).toBe("http://heat-one.admin");
  });

  it("throws NotFoundError when nothing fits", () => {
    expect(() => findCatalogEndpoint(catalog, "orchestration", { region: "RegionTwo", interface: "admin" })).toThrow(
      new NotFoundError("No admin orchestration endpoint in region RegionTwo in the service catalog"),
    );
  });
});

// =============================================================================
// KeystoneAuthProvider
// =============================================================================

describe("KeystoneAuthProvider", () => {
  const tokenResponse = {
    access: {
      token: { id: "tok_test", expires: "2026-01-01T01:00:00Z", tenant: { id: "tenant-1", name: "admin" } },
      serviceCatalog: [
        {
          type: "identity",
          name: "keystone",
          endpoints: [
            {
              region: "RegionOne",
              publicURL: "http://keystone.test:5000/v2.0",
              adminURL: "http://keystone.test:35357/v2.0",
            },
          ],
        },
      ],
    },
  };

  it("posts password credentials and returns a session", async () => {
    mockFetch.mockResolvedValueOnce(new Response(JSON.stringify(tokenResponse), { status: 200 }));

    const session = await new KeystoneAuthProvider().authenticate(credentialsFromEnv(env));

    expect(session.token).toBe("tok_test");
    expect(session.tenantId).toBe("tenant-1");
    expect(session.expiresAt).toBe("2026-01-01T01:00:00Z");
    expect(session.endpointFor("identity", { interface: "admin" })).toBe("http://keystone.test:35357/v2.0");

    const [url, init] = mockFetch.mock.calls[0];
    expect(url).toBe("http://keystone.test:5000/v2.0/tokens");
    expect(JSON.parse(String(init?.body))).toEqual({
      auth: { passwordCredentials: { username: "admin", password: "test-secret" }, tenantName: "admin" },
    });
  });

  it("fails before any request when credentials are missing", async () => {
    await expect(new KeystoneAuthProvider().authenticate(credentialsFromEnv({}))).rejects.toThrow(
      AuthenticationError,
    );
    expect(mockFetch).not.toHaveBeenCalled();
  });

  it("surfaces rejected credentials as AuthenticationError", async () => {
    mockFetch.mockResolvedValueOnce(
      new Response(JSON.stringify({ error: { message: "Invalid user / password", code: 401 } }), { status: 401 }),
    );

    await expect(new KeystoneAuthProvider({ maxAttempts: 1 }).authenticate(credentialsFromEnv(env))).rejects.toThrow(
      new AuthenticationError("Invalid user / password", 401),
    );
  });
});
