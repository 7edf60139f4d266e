import request from "supertest";
import { createTestApp } from "../utils/test-app";
import { found } from "../utils/fake-sources";
import { AttributionDataset } from "../../src/services/attribution/attribution-dataset";

const managed: AttributionDataset = {
  name: "cloud",
  encoding: "static",
  lookup: async (address) =>
    address === "1.1.1.1" ? { orgManaged: true, orgId: "org-cf", platform: "edge" } : null,
  close: async () => undefined,
};

describe("Enrichment API", () => {
  const { app, pipeline } = createTestApp({
    geo: {
      "8.8.8.8": found(
        { city: "Mountain View", country: "United States", isoCode: "US" },
        { asn: 15169, asnOrg: "GOOGLE" }
      ),
      "1.1.1.1": found({ country: "Australia", isoCode: "AU" }, { asn: 13335, asnOrg: "CLOUDFLARENET" }),
      "1.1.1.2": found({ country: "Australia", isoCode: "AU" }, { asn: 13335, asnOrg: "CLOUDFLARENET" }),
    },
    datasets: [managed],
  });

  test("GET /health should report the service as up", async () => {
    const response = await request(app).get("/health");

    expect(response.status).toBe(200);
    expect(response.body).toEqual({ status: "UP" });
  });

  describe("GET /api/enrich", () => {
    test("should enrich a single address", async () => {
      const response = await request(app).get("/api/enrich").query({ ip: "8.8.8.8" });

      expect(response.status).toBe(200);
      expect(response.body.records).toEqual([
        {
          address: "8.8.8.8",
          domain: null,
          city: "Mountain View",
          region: null,
          country: "United States",
          isoCode: "US",
          postal: null,
          asn: 15169,
          asnOrg: "GOOGLE",
          proxyType: null,
          isp: null,
          usageType: null,
          orgManaged: false,
          orgId: null,
          platform: null,
          error: null,
        },
      ]);
      expect(response.body.stats).toMatchObject({ totalAddresses: 1, successfulLookups: 1 });
    });

    test("should expand a CIDR block and sort", async () => {
      const response = await request(app)
        .get("/api/enrich")
        .query({ ip: "1.1.1.0/30", sortBy: "org_id" });

      expect(response.status).toBe(200);
      expect(
        response.body.records.map((r: { address: string; orgId: string | null }) => [r.address, r.orgId])
      ).toEqual([
        ["1.1.1.1", "org-cf"],
        ["1.1.1.2", null],
      ]);
    });

    test("should require the ip parameter", async () => {
      const response = await request(app).get("/api/enrich");

      expect(response.status).toBe(400);
      expect(response.body).toEqual({ error: "Missing required query parameter: ip" });
    });

    test("should reject an invalid address", async () => {
      const response = await request(app).get("/api/enrich").query({ ip: "300.1.1.1" });

      expect(response.status).toBe(400);
      expect(response.body).toEqual({
        error: "Invalid IP address: 300.1.1.1",
        code: "VALIDATION_ERROR",
      });
    });

    test("should reject an oversized block with the limit", async () => {
      const response = await request(app).get("/api/enrich").query({ ip: "8.0.0.0/16" });

      expect(response.status).toBe(400);
      expect(response.body).toEqual({
        error: "CIDR block 8.0.0.0/16 too large: 65534 hosts exceeds the limit of 1024",
        code: "CIDR_TOO_LARGE",
      });
    });

    test("should reject an unknown sort field", async () => {
      const response = await request(app).get("/api/enrich").query({ ip: "8.8.8.8", sortBy: "zip" });

      expect(response.status).toBe(400);
      expect(response.body.error).toMatch(/^Invalid sort field: zip\. Valid options: /);
    });
  });

  describe("POST /api/enrich", () => {
    test("should scan text, filter and keep failed lookups", async () => {
      const response = await request(app)
        .post("/api/enrich")
        .send({
          text: "hits from 8.8.8.8, 1.1.1.1 and 4.4.4.4",
          exclude: { countries: ["us"], orgManaged: true },
        });

      expect(response.status).toBe(200);
      expect(response.body.records).toEqual([
        expect.objectContaining({ address: "4.4.4.4", error: "address not found in database" }),
      ]);
      expect(response.body.stats).toMatchObject({
        totalAddresses: 3,
        successfulLookups: 2,
        failedLookups: 1,
        filteredOut: 2,
        filterRate: 100,
      });
    });

    test("should return CSV when asked", async () => {
      const response = await request(app)
        .post("/api/enrich")
        .send({ addresses: ["1.1.1.1"], format: "csv" });

      expect(response.status).toBe(200);
      expect(response.headers["content-type"]).toMatch(/^text\/csv/);
      expect(response.text.split("\n")).toEqual([
        "ip,org_managed,org_id,platform,proxy_type,domain,city,region,country,iso_code,isp,usage_type,asn,asn_org,error",
        '"1.1.1.1","true","org-cf","edge","","","","","Australia","AU","","","13335","CLOUDFLARENET",""',
      ]);
    });

    test("should reject a body without addresses or text", async () => {
      const response = await request(app).post("/api/enrich").send({ exclude: {} });

      expect(response.status).toBe(400);
      expect(response.body).toEqual({ error: "Provide at least one address or a text to scan" });
    });

    test("should reject unknown exclusion keys and out-of-range ASNs", async () => {
      const unknownKey = await request(app)
        .post("/api/enrich")
        .send({ addresses: ["8.8.8.8"], exclude: { continents: ["EU"] } });
      const badAsn = await request(app)
        .post("/api/enrich")
        .send({ addresses: ["8.8.8.8"], exclude: { asns: [4294967296] } });

      expect(unknownKey.status).toBe(400);
      expect(unknownKey.body.error).toMatch(/^exclude: Unrecognized key/);
      expect(badAsn.status).toBe(400);
      expect(badAsn.body.error).toMatch(/^exclude\.asns\.0: /);
    });
  });

  test("GET /api/enrich/attribution should list datasets", async () => {
    const response = await request(app).get("/api/enrich/attribution");

    expect(response.status).toBe(200);
    expect(response.body).toEqual({ hasData: true, datasets: ["cloud"] });
  });

  test("should answer 500 when the pipeline fails unexpectedly", async () => {
    const spy = jest.spyOn(pipeline, "run").mockRejectedValueOnce(new Error("disk on fire"));

    const response = await request(app).get("/api/enrich").query({ ip: "8.8.8.8" });

    expect(response.status).toBe(500);
    expect(response.body).toEqual({ error: "Failed to process enrichment request" });
    spy.mockRestore();
  });
});
