/** Title band drawn above the chart in the exported PNG. */
export const TITLE_HEIGHT = 48;

export function downloadBlob(filename: string, blob: Blob) {
  const url = URL.createObjectURL(blob);
  const a = document.createElement("a");
  a.href = url;
  a.download = filename;
  document.body.appendChild(a);
  a.click();
  a.remove();
  URL.revokeObjectURL(url);
}

const loadImage = (src: string): Promise<HTMLImageElement> =>
  new Promise((resolve, reject) => {
    const img = new Image();
    img.onload = () => resolve(img);
    img.onerror = () => reject(new Error("image_decode_failed"));
    img.src = src;
  });

const pad = (n: number) => String(n).padStart(2, "0");

/** `Alex_AI潜力画像_20260704_093005.png`, local time. */
export function chartFileName(nickname: string, at: Date): string {
  const name = nickname.trim().replace(/[\\/:*?"<>|\s]+/g, "_") || "我的";
  const stamp =
    `${at.getFullYear()}${pad(at.getMonth() + 1)}${pad(at.getDate())}` +
    `_${pad(at.getHours())}${pad(at.getMinutes())}${pad(at.getSeconds())}`;
  return `${name}_AI潜力画像_${stamp}.png`;
}

/** Rasterizes the chart SVG on a white background with the title on top. */
export async function renderChartPng(
  svg: SVGSVGElement,
  title: string,
  size: { width: number; height: number },
  scale = 2,
): Promise<Blob> {
  const xml = new XMLSerializer().serializeToString(svg);
  const img = await loadImage(`data:image/svg+xml;charset=utf-8,${encodeURIComponent(xml)}`);

  const canvas = document.createElement("canvas");
  canvas.width = size.width * scale;
  canvas.height = (size.height + TITLE_HEIGHT) * scale;
  const ctx = canvas.getContext("2d");
  if (!ctx) throw new Error("canvas_unavailable");

  ctx.scale(scale, scale);
  ctx.fillStyle = "#ffffff";
  ctx.fillRect(0, 0, size.width, size.height + TITLE_HEIGHT);
  ctx.fillStyle = "#2c3e50";
  ctx.font = "bold 20px sans-serif";
  ctx.textAlign = "center";
  ctx.fillText(title, size.width / 2, 32);
  ctx.drawImage(img, 0, TITLE_HEIGHT, size.width, size.height);

  return new Promise((resolve, reject) => {
    canvas.toBlob((blob) => (blob ? resolve(blob) : reject(new Error("png_encode_failed"))), "image/png");
  });
}
