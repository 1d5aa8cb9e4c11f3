import { Resvg } from "@resvg/resvg-js";
import { ChartUnavailableError } from "./errors";
import type { ChartDescriptor, ChartType, StageResult } from "./types";
import { explained, isSupportedChartType, ok } from "./types";

export type RenderOptions = {
  width?: number;
  height?: number;
};

export type PreparedChart = {
  type: ChartType;
  title: string;
  yAxisLabel: string;
  labels: string[];
  values: number[];
};

const COLORS = ["#2563eb", "#16a34a", "#f59e0b", "#ef4444", "#8b5cf6", "#0891b2", "#db2777", "#65a30d"];
const FONT = "Arial, Helvetica, sans-serif";

/**
 * Checks a descriptor before drawing. Missing data, an empty series, an unknown
 * chart type or an undrawable pie come back as explained results; a label/value
 * length mismatch is logged and cut to the common prefix.
 */
export function prepareChart(descriptor: ChartDescriptor): StageResult<PreparedChart> {
  if (!descriptor.can_generate_chart) {
    return explained("chart_data_insufficient", descriptor.message || "No chart data could be extracted from the answer.");
  }
  const { labels, values } = descriptor;
  if (labels.length === 0 || values.length === 0) {
    return explained("malformed_descriptor", "The chart descriptor has no labels or no values to plot.");
  }
  let n = labels.length;
  if (labels.length !== values.length) {
    n = Math.min(labels.length, values.length);
    console.warn(
      `Chart descriptor has ${labels.length} labels but ${values.length} values; rendering the first ${n} of each`
    );
  }
  const type = descriptor.chart_type;
  if (!isSupportedChartType(type)) {
    return explained("unsupported_chart_type", `Chart type '${type}' is not supported; expected bar, line or pie.`);
  }
  const vals = values.slice(0, n);
  if (!vals.every((v) => Number.isFinite(v))) {
    return explained("malformed_descriptor", "The chart descriptor contains non-numeric values.");
  }
  if (type === "pie") {
    const total = vals.reduce((a, v) => a + v, 0);
    if (vals.some((v) => v < 0) || !(total > 0)) {
      return explained("malformed_descriptor", "Pie chart values must be non-negative with a positive total.");
    }
  }
  return ok({
    type,
    title: descriptor.title,
    yAxisLabel: descriptor.y_axis_label,
    labels: labels.slice(0, n),
    values: vals,
  });
}

export function xmlEscape(s: string): string {
  return s
    .replace(/[\u0000-\u0008\u000B\u000C\u000E-\u001F]/g, "")
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}

function fmtNum(n: number): string {
  if (Math.abs(n) >= 1000) return (n / 1000).toFixed(1) + "K";
  return n.toFixed(1);
}

function makeTicks(min: number, max: number, count: number): number[] {
  const step = (max - min) / (count - 1);
  const arr: number[] = [];
  for (let i = 0; i < count; i++) arr.push(min + i * step);
  return arr;
}

function axesChart(chart: PreparedChart, width: number, height: number): string {
  const m = { top: 60, right: 30, bottom: 70, left: 90 };
  const iw = width - m.left - m.right;
  const ih = height - m.top - m.bottom;
  const xs = chart.labels.length;
  const isBar = chart.type === "bar";

  let ymin = Math.min(...chart.values);
  let ymax = Math.max(...chart.values);
  if (isBar) {
    ymin = Math.min(0, ymin);
    ymax = Math.max(0, ymax);
  }
  if (ymax === ymin) {
    ymin -= 1;
    ymax += 1;
  }
  const yTicks = makeTicks(ymin, ymax, 5);
  const yFor = (v: number) => ih - ((v - ymin) / (ymax - ymin)) * ih;
  const xFor = (i: number) => (xs <= 1 ? iw / 2 : (i * iw) / (xs - 1));
  const groupW = iw / xs;
  const barGap = Math.min(14, groupW * 0.15);
  const barW = Math.max(6, groupW - barGap * 2);
  const rotateX = chart.labels.some((l) => l.length > 8) || xs > 8;

  const parts: string[] = [];
  for (const t of yTicks) {
    parts.push(`<line x1="0" y1="${yFor(t)}" x2="${iw}" y2="${yFor(t)}" stroke="#e5e7eb" stroke-width="1"/>`);
    parts.push(
      `<text x="-10" y="${yFor(t) + 4}" text-anchor="end" font-size="12" fill="#6b7280">${xmlEscape(fmtNum(t))}</text>`
    );
  }
  parts.push(`<line x1="0" y1="0" x2="0" y2="${ih}" stroke="#9ca3af" stroke-width="1"/>`);
  const baseline = isBar ? yFor(0) : ih;
  parts.push(`<line x1="0" y1="${baseline}" x2="${iw}" y2="${baseline}" stroke="#9ca3af" stroke-width="1"/>`);

  chart.labels.forEach((lab, i) => {
    const x = isBar ? i * groupW + groupW / 2 : xFor(i);
    const transform = rotateX ? ` transform="rotate(-20 ${x} ${ih + 20})"` : "";
    parts.push(
      `<text x="${x}" y="${ih + 20}" text-anchor="${rotateX ? "end" : "middle"}" font-size="12" fill="#374151"${transform}>${xmlEscape(lab)}</text>`
    );
  });

  if (isBar) {
    chart.values.forEach((v, i) => {
      const y0 = yFor(Math.min(0, v));
      const y1 = yFor(Math.max(0, v));
      const h = Math.max(2, Math.abs(y1 - y0));
      parts.push(
        `<rect x="${i * groupW + barGap}" y="${Math.min(y0, y1)}" width="${barW}" height="${h}" fill="${COLORS[0]}" opacity="0.9" rx="3"/>`
      );
    });
  } else {
    const pts = chart.values.map((v, i) => `${xFor(i)},${yFor(v)}`).join(" ");
    parts.push(`<polyline fill="none" stroke="${COLORS[0]}" stroke-width="2.5" points="${pts}"/>`);
    chart.values.forEach((v, i) => {
      parts.push(`<circle cx="${xFor(i)}" cy="${yFor(v)}" r="4" fill="${COLORS[0]}"/>`);
    });
  }

  const yLabel = chart.yAxisLabel
    ? `<text transform="translate(${-m.left + 22},${ih / 2}) rotate(-90)" text-anchor="middle" font-size="13" fill="#374151">${xmlEscape(chart.yAxisLabel)}</text>`
    : "";
  return `<g transform="translate(${m.left},${m.top})">${parts.join("")}${yLabel}</g>`;
}

function pieChart(chart: PreparedChart, width: number, height: number): string {
  const top = 60;
  const legendW = Math.min(260, width * 0.35);
  const iw = width - legendW - 40;
  const ih = height - top - 30;
  const cx = 20 + iw / 2;
  const cy = top + ih / 2;
  const outer = Math.min(iw, ih) / 2 - 4;
  const total = chart.values.reduce((a, v) => a + v, 0);

  const parts: string[] = [];
  let angle = -Math.PI / 2;
  chart.values.forEach((v, i) => {
    const color = COLORS[i % COLORS.length];
    const frac = v / total;
    const theta = frac * Math.PI * 2;
    if (frac >= 0.9999) {
      parts.push(`<circle cx="${cx}" cy="${cy}" r="${outer}" fill="${color}" opacity="0.95"/>`);
    } else if (frac > 0) {
      const x0 = cx + outer * Math.cos(angle);
      const y0 = cy + outer * Math.sin(angle);
      const x1 = cx + outer * Math.cos(angle + theta);
      const y1 = cy + outer * Math.sin(angle + theta);
      const large = theta > Math.PI ? 1 : 0;
      parts.push(
        `<path d="M ${cx} ${cy} L ${x0} ${y0} A ${outer} ${outer} 0 ${large} 1 ${x1} ${y1} Z" fill="${color}" opacity="0.95"/>`
      );
    }
    if (frac > 0.03) {
      const mid = angle + theta / 2;
      const lx = cx + outer * 0.7 * Math.cos(mid);
      const ly = cy + outer * 0.7 * Math.sin(mid);
      parts.push(
        `<text x="${lx}" y="${ly}" text-anchor="middle" font-size="12" font-weight="bold" fill="#ffffff">${Math.round(frac * 100)}%</text>`
      );
    }
    angle += theta;
  });

  const legendX = width - legendW;
  chart.labels.forEach((lab, i) => {
    const y = top + 10 + i * 22;
    parts.push(`<rect x="${legendX}" y="${y}" width="12" height="12" rx="2" fill="${COLORS[i % COLORS.length]}"/>`);
    parts.push(`<text x="${legendX + 18}" y="${y + 10}" font-size="12" fill="#374151">${xmlEscape(lab)}</text>`);
  });
  return parts.join("");
}

export function chartSvg(chart: PreparedChart, opts: RenderOptions = {}): string {
  const width = Math.max(320, opts.width ?? 800);
  const height = Math.max(240, opts.height ?? 480);
  const body = chart.type === "pie" ? pieChart(chart, width, height) : axesChart(chart, width, height);
  return [
    `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" viewBox="0 0 ${width} ${height}" font-family="${FONT}">`,
    `<rect width="${width}" height="${height}" fill="#ffffff"/>`,
    `<text x="${width / 2}" y="32" text-anchor="middle" font-size="18" font-weight="bold" fill="#111827">${xmlEscape(chart.title)}</text>`,
    body,
    `</svg>`,
  ].join("");
}

/** Renders a descriptor to PNG bytes; never writes files. */
export function renderChart(descriptor: ChartDescriptor, opts: RenderOptions = {}): StageResult<Buffer> {
  const prepared = prepareChart(descriptor);
  if (prepared.status !== "ok") return prepared;
  const svg = chartSvg(prepared.value, opts);
  const png = new Resvg(svg, {
    font: { loadSystemFonts: true, defaultFontFamily: "Arial" },
  })
    .render()
    .asPng();
  return ok(png);
}

export function renderOrThrow(descriptor: ChartDescriptor, opts: RenderOptions = {}): Buffer {
  const res = renderChart(descriptor, opts);
  if (res.status === "ok") return res.value;
  if (res.status === "explained") throw new ChartUnavailableError(res.reason, res.message);
  throw res.error;
}
