/**
 * @switchyard/disposable - DisposableProvider
 *
 * Presents a DisposableSessionController through the uniform provider
 * capability. Identity is owned by the controller, so the provider declares
 * no session policy and the facade never asks it to open or close one.
 */

import {
  ProviderError,
  type CredentialBlob,
  type ProviderCapability,
  type ProviderContext,
  type ProviderKind,
  type ProviderRequest,
  type ProviderResponse,
} from '@switchyard/core';
import type { DisposableSessionController } from './controller.js';
import { DisposableResetError } from './errors.js';

export interface DisposableProviderInfo {
  name: string;
  kind?: ProviderKind;
  models: readonly string[];
}

export class DisposableProvider implements ProviderCapability {
  readonly id: string;
  readonly name: string;
  readonly kind: ProviderKind;
  readonly models: readonly string[];

  constructor(
    readonly controller: DisposableSessionController,
    info: DisposableProviderInfo,
  ) {
    this.id = controller.provider;
    this.name = info.name;
    this.kind = info.kind ?? 'browser';
    this.models = info.models;
  }

  async invoke(request: ProviderRequest, ctx: ProviderContext): Promise<ProviderResponse> {
    try {
      return await this.controller.dispatch(request, ctx.signal);
    } catch (err) {
      if (err instanceof DisposableResetError) {
        throw new ProviderError(err.message, 'transient', this.id, { cause: err });
      }
      throw err;
    }
  }

  async openSession(): Promise<CredentialBlob> {
    return null;
  }

  async closeSession(): Promise<void> {}
}
