/**
 * 环境变量解析工具
 *
 * 核心导出：
 * - parseEnvPositiveInt(): 解析正整数环境变量
 * - parseEnvOptionalString(): 解析可选字符串环境变量
 */

/**
 * 解析正整数类型的环境变量（必须大于 0）
 *
 * @param value - 环境变量值
 * @param fallback - 默认值
 */
export function parseEnvPositiveInt(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value ?? '', 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

/**
 * 解析可选字符串环境变量（空字符串视为未设置）
 */
export function parseEnvOptionalString(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed && trimmed.length > 0 ? trimmed : undefined;
}
