interface BadgeStyle {
  color: string;
  bgColor: string;
}

const badgeStyles: BadgeStyle[] = [
  { color: "#35D07F", bgColor: "#0F172A" },
  { color: "#2DCCFF", bgColor: "#0F172A" },
  { color: "#A78BFA", bgColor: "#0F172A" },
  { color: "#FFB84D", bgColor: "#0F172A" },
  { color: "#F472B6", bgColor: "#0F172A" },
];

function escapeXml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}

/// Generate SVG artwork for a badge; colour cycles with the badge position
export function generateBadgeSVG(
  name: string,
  requiredPoints: number,
  position: number
): string {
  const style = badgeStyles[position % badgeStyles.length];

  return `
<svg width="300" height="300" viewBox="0 0 300 300" xmlns="http://www.w3.org/2000/svg">
  <rect width="300" height="300" fill="${style.bgColor}"/>
  <rect width="300" height="300" fill="none" stroke="${style.color}" stroke-width="3" rx="20"/>
  <text x="150" y="100" font-size="24" font-weight="bold" fill="${style.color}"
        text-anchor="middle" font-family="system-ui, sans-serif">
    SOULBOUND
  </text>
  <text x="150" y="155" font-size="28" font-weight="bold" fill="${style.color}"
        text-anchor="middle" font-family="system-ui, sans-serif">
    ${escapeXml(name)}
  </text>
  <text x="150" y="200" font-size="14" fill="${style.color}"
        text-anchor="middle" font-family="system-ui, sans-serif" opacity="0.8">
    ${requiredPoints} reputation points
  </text>
  <circle cx="150" cy="250" r="8" fill="${style.color}"/>
</svg>
  `.trim();
}

/// Encode SVG to data URI
export function encodeBadgeSVG(svg: string): string {
  const encoded = Buffer.from(svg).toString("base64");
  return `data:image/svg+xml;base64,${encoded}`;
}
