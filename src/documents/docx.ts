export async function readDocxText(filePath: string): Promise<string> {
  const { default: mammoth } = await import("mammoth");
  const result = await mammoth.extractRawText({ path: filePath });
  return result.value;
}
