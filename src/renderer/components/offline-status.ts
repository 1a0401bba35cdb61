/**
 * Badge showing whether the page and its audio are available offline
 */

import { LitElement, html, css, nothing } from 'lit';
import { customElement, property, state } from 'lit/decorators.js';
import { sharedStyles } from '../styles/shared.js';
import { registerOfflineWorker, OfflineRegistration } from '../utils/index.js';
import { CACHE_CONFIG } from '../../shared/constants/index.js';

export type OfflineStatusState = 'registering' | 'caching' | 'ready' | 'unsupported' | 'failed';

const LABELS: Record<OfflineStatusState, string> = {
  registering: 'Preparing offline mode…',
  caching: 'Downloading audio for offline use…',
  ready: 'Available offline',
  unsupported: 'Offline mode unavailable',
  failed: 'Offline setup failed'
};

@customElement('offline-status')
export class OfflineStatus extends LitElement {
  @property({ type: String, attribute: 'script-url' })
  scriptUrl: string = CACHE_CONFIG.WORKER_SCRIPT;

  @state()
  private status: OfflineStatusState = 'registering';

  private registration: OfflineRegistration | null = null;

  static styles = [
    sharedStyles,
    css`
      :host {
        display: inline-block;
      }
    `
  ];

  connectedCallback(): void {
    super.connectedCallback();

    const container = 'serviceWorker' in navigator ? navigator.serviceWorker : undefined;
    registerOfflineWorker(container, {
      scriptUrl: this.scriptUrl,
      onOfflineReady: () => {
        this.status = 'ready';
      }
    })
      .then(registration => {
        this.registration = registration;
        if (!registration) {
          this.status = 'unsupported';
        } else if (registration.alreadyActive) {
          this.status = 'ready';
        } else if (this.status === 'registering') {
          this.status = 'caching';
        }
      })
      .catch(() => {
        this.status = 'failed';
      });
  }

  disconnectedCallback(): void {
    super.disconnectedCallback();
    this.registration?.unsubscribe();
    this.registration = null;
  }

  render() {
    const variant = this.status === 'ready'
      ? 'badge-success'
      : this.status === 'failed' ? 'badge-error' : 'badge-warning';

    return html`
      <span class="badge ${variant}" role="status">
        ${this.status === 'registering' || this.status === 'caching' ? html`<span class="spinner"></span>` : nothing}
        ${LABELS[this.status]}
      </span>
    `;
  }
}
