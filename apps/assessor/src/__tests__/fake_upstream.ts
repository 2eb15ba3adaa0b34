// In-process stand-ins for the USGS and NWS services, bound to 127.0.0.1 on an
// ephemeral port. Routes read `ref.baseUrl` at request time, so payloads can
// link back to the same server (NWS forecastGridData).

import Fastify, { type FastifyInstance } from "fastify";

export type UpstreamRef = { baseUrl: string };

export type FakeUpstream = {
  baseUrl: string;
  // request urls (path + query) in arrival order
  hits: string[];
  close: () => Promise<void>;
};

export async function startFakeUpstream(register: (app: FastifyInstance, ref: UpstreamRef) => void): Promise<FakeUpstream> {
  const app = Fastify({ logger: false });
  const ref: UpstreamRef = { baseUrl: "" };
  const hits: string[] = [];

  app.addHook("onRequest", async (req) => {
    hits.push(req.url);
  });
  register(app, ref);

  ref.baseUrl = await app.listen({ host: "127.0.0.1", port: 0 });
  return { baseUrl: ref.baseUrl, hits, close: () => app.close() };
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// --- payload builders ---

export function usgsSeries(paramCode: string, samples: Array<[dateTime: string, value: string]>, noDataValue = -999999) {
  return {
    variable: { variableCode: [{ value: paramCode }], noDataValue },
    values: [{ value: samples.map(([dateTime, value]) => ({ value, dateTime })) }],
  };
}

export function usgsPayload(series: unknown[]) {
  return { value: { timeSeries: series } };
}

export function nwsPoints(baseUrl: string, grid = { id: "STO", x: 41, y: 68 }) {
  return {
    properties: {
      gridId: grid.id,
      gridX: grid.x,
      gridY: grid.y,
      forecastGridData: `${baseUrl}/gridpoints/${grid.id}/${grid.x},${grid.y}`,
    },
  };
}

export function nwsGrid(
  qpf: Array<[validTime: string, value: number | null]>,
  pop: Array<[validTime: string, value: number | null]> = []
) {
  return {
    properties: {
      quantitativePrecipitation: { uom: "wmoUnit:mm", values: qpf.map(([validTime, value]) => ({ validTime, value })) },
      probabilityOfPrecipitation: { uom: "wmoUnit:percent", values: pop.map(([validTime, value]) => ({ validTime, value })) },
    },
  };
}
