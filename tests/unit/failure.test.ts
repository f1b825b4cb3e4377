import { AdmissionTimeoutError } from "../../src/application/admission/AdmissionController";
import { AssetRequestError, DownloadJobError } from "../../src/application/download-chapter/download.error-handler";
import { describeFailure, errorMessage } from "../../src/application/failure";

describe("describeFailure", () => {
  it("takes code and context from a DownloadJobError and drops the cause", () => {
    const err = new DownloadJobError({
      code: "outcome_report_failed",
      message: "Asset outcome could not be recorded",
      context: { source: "mangapill", label: "ch1", index: 4 },
      cause: { body: "<html>" }
    });

    expect(describeFailure(err)).toEqual({
      name: "DownloadJobError",
      message: "Asset outcome could not be recorded",
      code: "outcome_report_failed",
      context: { source: "mangapill", label: "ch1", index: 4 }
    });
  });

  it("reports an admission timeout with the source and the wait", () => {
    expect(describeFailure(new AdmissionTimeoutError("mangapill", 1500))).toEqual({
      name: "AdmissionTimeoutError",
      message: "No admission slot for source=mangapill after 1500ms",
      code: "admission_timeout",
      context: { source: "mangapill", waitedMs: 1500 }
    });
  });

  it("prefixes the failure kind of an asset request and keeps its status", () => {
    const err = new AssetRequestError({ kind: "http", message: "Asset request failed: 503", requestUrl: "http://h/1.jpg", status: 503 });

    expect(describeFailure(err)).toEqual({
      name: "AssetRequestError",
      message: "Asset request failed: 503",
      code: "asset_http",
      status: 503
    });
  });

  it("keeps only known context fields of other errors", () => {
    const err = Object.assign(new Error("connection refused"), {
      code: "ECONNREFUSED",
      context: { source: "global", secret: "test-secret" },
      status: Number.NaN
    });

    expect(describeFailure(err)).toEqual({
      name: "Error",
      message: "connection refused",
      code: "ECONNREFUSED",
      context: { source: "global" }
    });
  });

  it("wraps thrown non-errors", () => {
    expect(describeFailure("boom")).toEqual({ name: "Error", message: "boom" });
    expect(errorMessage(42)).toBe("42");
  });
});
