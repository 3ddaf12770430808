/**
 * Static strategy - a fixed list of images
 */

import { DesiredImage, DesiredImages } from '../types';
import { DesiredImageStrategy } from './types';

export interface StaticImageConfig {
  image_url: string;
  digest?: string | null;
  name?: string;
}

export class StaticStrategy implements DesiredImageStrategy {
  readonly type = 'static';
  private readonly images: readonly DesiredImage[];

  constructor(images: readonly StaticImageConfig[]) {
    this.images = images.map((image) => ({
      imageURL: image.image_url,
      digest: image.digest ?? null,
      displayName: image.name ?? image.image_url,
    }));
  }

  async desiredImages(): Promise<DesiredImages> {
    return {
      priority: this.images.map((image) => ({ ...image })),
      all: this.images.map((image) => ({ ...image })),
    };
  }
}
