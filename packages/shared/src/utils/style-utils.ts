import type { ClientModels, SdVersion, Style } from '../types/style-types';

/**
 * Architecture of a style: its explicit version, else the installed checkpoint's, else SD 1.5
 */
export function resolveSdVersion(style: Style, models: Pick<ClientModels, 'checkpoints'>): SdVersion {
  if (style.sdVersion !== 'auto') {
    return style.sdVersion;
  }
  return models.checkpoints[style.checkpoint]?.sdVersion ?? 'sd15';
}

/**
 * Styles whose checkpoint is installed on the server, in catalog order
 */
export function filterSupportedStyles(
  styles: readonly Style[],
  models: Pick<ClientModels, 'checkpoints'>,
): Style[] {
  return styles.filter((s) => s.checkpoint in models.checkpoints);
}
