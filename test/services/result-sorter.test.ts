import { parseSortKey, sortRecords } from "../../src/services/result-sorter";
import { ValidationError } from "../../src/errors";
import { record } from "../utils/fake-sources";

describe("sortRecords", () => {
  test("should sort ASNs numerically with absent values last", () => {
    const records = [
      record("8.8.8.8", { asn: 15169 }),
      record("1.1.1.1", { asn: 13335 }),
      record("9.9.9.9"),
    ];

    expect(sortRecords(records, "asn").map((r) => r.asn)).toEqual([13335, 15169, null]);
  });

  test("should compare numbers by value, not text", () => {
    const records = [record("a", { asn: 9 }), record("b", { asn: 10 }), record("c", { asn: 100 })];

    expect(sortRecords(records, "asn").map((r) => r.asn)).toEqual([9, 10, 100]);
  });

  test("should compare strings by code unit", () => {
    const records = [
      record("1.1.1.1", { city: "amsterdam" }),
      record("2.2.2.2", { city: "Zurich" }),
      record("3.3.3.3", { city: "Berlin" }),
    ];

    expect(sortRecords(records, "city").map((r) => r.city)).toEqual([
      "Berlin",
      "Zurich",
      "amsterdam",
    ]);
  });

  test("should keep input order for equal keys and among absent values", () => {
    const records = [
      record("1.1.1.1", { country: "US" }),
      record("2.2.2.2"),
      record("3.3.3.3", { country: "CA" }),
      record("4.4.4.4", { country: "US" }),
      record("5.5.5.5"),
    ];

    expect(sortRecords(records, "country").map((r) => r.address)).toEqual([
      "3.3.3.3",
      "1.1.1.1",
      "4.4.4.4",
      "2.2.2.2",
      "5.5.5.5",
    ]);
  });

  test("should be idempotent and leave the input untouched", () => {
    const records = [
      record("8.8.8.8", { asnOrg: "GOOGLE" }),
      record("1.1.1.1", { asnOrg: "CLOUDFLARENET" }),
    ];
    const before = [...records];

    const once = sortRecords(records, "asnOrg");

    expect(sortRecords(once, "asnOrg")).toEqual(once);
    expect(records).toEqual(before);
    expect(once).not.toBe(records);
  });
});

describe("parseSortKey", () => {
  test.each([
    { input: "asn", key: "asn" },
    { input: "ip", key: "address" },
    { input: "iso_code", key: "isoCode" },
    { input: "asn_org", key: "asnOrg" },
    { input: "org_id", key: "orgId" },
  ])("should resolve $input to $key", ({ input, key }) => {
    expect(parseSortKey(input)).toBe(key);
  });

  test("should list the valid options for an unknown field", () => {
    expect(() => parseSortKey("postal")).toThrow(
      new ValidationError(
        "Invalid sort field: postal. Valid options: address, asn, asnOrg, city, country, domain, isoCode, orgId, platform, region"
      )
    );
  });
});
