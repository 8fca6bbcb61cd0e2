import https from "https";
import axios, { AxiosInstance } from "axios";

export type HttpClient = Pick<AxiosInstance, "get">;

const USER_AGENT = "health-signals-service/1.0";

export function createHttpClient(timeoutMs: number) {
  const httpsAgent = new https.Agent({
    keepAlive: true,
    maxSockets: 10,
  });

  const axiosClient = axios.create({
    timeout: timeoutMs,
    httpsAgent,
    headers: {
      "User-Agent": USER_AGENT,
    },
  });

  return { axiosClient, httpsAgent };
}
