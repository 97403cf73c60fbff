import got, { RequestError } from "got";

const USER_AGENT = "docs-builder-linkcheck";

export interface ProbeResult {
  ok: boolean;
  status?: number;
  reason: string;
}

// servers that refuse HEAD get one GET instead
const HEAD_REFUSED = [405, 501];

async function request(
  method: "head" | "get",
  url: string,
  timeout: number
): Promise<number> {
  const response = await got[method](url, {
    timeout: { request: timeout },
    throwHttpErrors: false,
    followRedirect: true,
    retry: { limit: 0 },
    headers: { "user-agent": USER_AGENT },
  });
  return response.statusCode;
}

/** Checks that `url` answers with a status below 400 */
async function probe(
  url: string,
  { timeout }: { timeout: number }
): Promise<ProbeResult> {
  try {
    let status = await request("head", url, timeout);
    if (HEAD_REFUSED.includes(status)) {
      status = await request("get", url, timeout);
    }
    return status < 400
      ? { ok: true, status, reason: `${status}` }
      : { ok: false, status, reason: `status ${status}` };
  } catch (err) {
    if (err instanceof RequestError) {
      return { ok: false, reason: err.code || err.message };
    }
    throw err;
  }
}

// Exported as an object instead of export keyword, so that these functions
// can be mocked in tests.
export default {
  probe,
};
