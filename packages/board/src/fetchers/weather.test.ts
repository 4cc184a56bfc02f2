import { describe, it, expect, vi, afterEach } from "vitest";
import { fetchWeather, parseWeather, weatherUrl } from "./weather";

const options = {
  apiUrl: "https://weather.example.test/v1/forecast",
  latitude: 52.5,
  longitude: 13.4,
  timezone: "Europe/Berlin",
};

// 2026-10-19T10:00:00Z
const READING_TIME = 1792404000;

function forecastBody() {
  return {
    latitude: 52.5,
    longitude: 13.4,
    current: { time: READING_TIME, interval: 900, temperature_2m: 12.34, uv_index: 1.46 },
    daily: {
      time: [1792360800],
      temperature_2m_min: [8.06],
      temperature_2m_max: [14.94],
      uv_index_max: [2.44],
    },
  };
}

describe("weatherUrl", () => {
  it("asks for current and daily values as unix time", () => {
    const url = weatherUrl(options);

    expect(url.origin + url.pathname).toBe("https://weather.example.test/v1/forecast");
    expect(url.searchParams.get("latitude")).toBe("52.5");
    expect(url.searchParams.get("current")).toBe("temperature_2m,uv_index");
    expect(url.searchParams.get("daily")).toBe("temperature_2m_min,temperature_2m_max,uv_index_max");
    expect(url.searchParams.get("timeformat")).toBe("unixtime");
    expect(url.searchParams.get("timezone")).toBe("Europe/Berlin");
  });
});

describe("parseWeather", () => {
  it("maps the response and rounds to one decimal", () => {
    expect(parseWeather(forecastBody())).toEqual({
      timestamp: READING_TIME * 1000,
      temperature: 12.3,
      uvIndex: 1.5,
      temperatureDailyMin: 8.1,
      temperatureDailyMax: 14.9,
      uvIndexDailyMax: 2.4,
    });
  });

  it("rejects a response without daily data", () => {
    const { daily: _daily, ...body } = forecastBody();
    expect(() => parseWeather(body)).toThrow("weather: Response is missing current or daily data");
  });

  it("rejects a missing daily value", () => {
    const body = forecastBody();
    body.daily.uv_index_max = [];
    expect(() => parseWeather(body)).toThrow("weather: Missing or invalid daily field: uv_index_max");
  });

  it("rejects a non-numeric current value", () => {
    const body = { ...forecastBody(), current: { time: READING_TIME, temperature_2m: "warm", uv_index: 1 } };
    expect(() => parseWeather(body)).toThrow("weather: Missing or invalid field: temperature_2m");
  });
});

describe("fetchWeather", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
  });

  it("fetches and parses one reading", async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => new Response(JSON.stringify(forecastBody()), { status: 200 }))
    );

    const reading = await fetchWeather(options);

    expect(reading.temperature).toBe(12.3);
    expect(console.log).toHaveBeenCalledWith(
      "[weather] Fetched reading for 2026-10-19T10:00:00.000Z"
    );
  });

  it("reports a body that is not JSON", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => new Response("<html>", { status: 200 })));

    await expect(fetchWeather(options)).rejects.toThrow(/^weather: Invalid JSON/);
  });
});
