import type { Scene, SceneEdge, SceneNode } from "./scene.js";

const BACKGROUND = "#F8FAFC";
const NODE_FILL = "#FFFFFF";
const NODE_BORDER = "#0F172A";
const EDGE_COLOR = "#334155";
const TEXT_COLOR = "#0F172A";
const SELECTED_COLOR = "#DC2626";
const FONT_SIZE = 12;

function fmt(value: number): string {
  return String(Number(value.toFixed(2)));
}

export function escapeXml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}

function renderEdge(edge: SceneEdge): string[] {
  const stroke = edge.selected ? SELECTED_COLOR : EDGE_COLOR;
  const { geometry } = edge;
  const lines: string[] = [];

  if (geometry.kind === "straight") {
    lines.push(
      `<line x1="${fmt(geometry.from.x)}" y1="${fmt(geometry.from.y)}" x2="${fmt(geometry.to.x)}" y2="${fmt(geometry.to.y)}" stroke="${stroke}" stroke-width="2"/>`,
    );
  } else {
    const d = `M ${fmt(geometry.from.x)} ${fmt(geometry.from.y)} Q ${fmt(geometry.control.x)} ${fmt(geometry.control.y)} ${fmt(geometry.to.x)} ${fmt(geometry.to.y)}`;
    lines.push(`<path d="${d}" fill="none" stroke="${stroke}" stroke-width="2"/>`);
  }

  if (edge.label) {
    const fill = edge.selected ? SELECTED_COLOR : TEXT_COLOR;
    lines.push(
      `<text x="${fmt(geometry.labelAnchor.x)}" y="${fmt(geometry.labelAnchor.y)}" fill="${fill}" font-size="${FONT_SIZE}">${escapeXml(edge.label)}</text>`,
    );
  }
  return lines;
}

function renderNode(node: SceneNode): string[] {
  const lines: string[] = [];
  const { x, y } = node.center;
  if (node.border > 0) {
    const borderColor = node.selected ? SELECTED_COLOR : NODE_BORDER;
    lines.push(`<circle cx="${fmt(x)}" cy="${fmt(y)}" r="${fmt((node.size + node.border) / 2)}" fill="${borderColor}"/>`);
  }
  const fill = node.hue === undefined ? NODE_FILL : `hsl(${fmt(node.hue)}, 70%, 65%)`;
  lines.push(`<circle cx="${fmt(x)}" cy="${fmt(y)}" r="${fmt(node.size / 2)}" fill="${fill}"/>`);
  if (node.label) {
    const textColor = node.selected ? SELECTED_COLOR : TEXT_COLOR;
    lines.push(
      `<text x="${fmt(x + node.size / 2 + 2)}" y="${fmt(y + 4)}" fill="${textColor}" font-size="${FONT_SIZE}">${escapeXml(node.label)}</text>`,
    );
  }
  return lines;
}

export function renderSvg(scene: Scene): string {
  const width = fmt(scene.width);
  const height = fmt(scene.height);
  const lines = [
    `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" viewBox="0 0 ${width} ${height}">`,
    `<rect width="${width}" height="${height}" fill="${BACKGROUND}"/>`,
  ];
  for (const edge of scene.edges) {
    lines.push(...renderEdge(edge));
  }
  for (const node of scene.nodes) {
    lines.push(...renderNode(node));
  }
  lines.push("</svg>");
  return `${lines.join("\n")}\n`;
}
