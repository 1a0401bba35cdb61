/**
 * Shared CSS styles for the PWA shell components
 */

import { css } from 'lit';

export const sharedStyles = css`
  :host {
    --primary-color: #007AFF;
    --success-color: #34C759;
    --success-light: #e8f5e8;
    --warning-color: #FF9500;
    --warning-light: #fff3e0;
    --error-color: #FF3B30;
    --error-light: #ffebee;
    --text-secondary: #666666;
    --border-color: #e0e0e0;
    --border-radius-small: 4px;
    --spacing-xs: 4px;
    --spacing-sm: 8px;
    --font-size-small: 12px;
  }

  .badge {
    display: inline-flex;
    align-items: center;
    gap: var(--spacing-xs);
    padding: var(--spacing-xs) var(--spacing-sm);
    border-radius: var(--border-radius-small);
    font-size: var(--font-size-small);
    color: var(--text-secondary);
    border: 1px solid var(--border-color);
  }

  .badge-success {
    background: var(--success-light);
    border-color: var(--success-color);
  }

  .badge-warning {
    background: var(--warning-light);
    border-color: var(--warning-color);
  }

  .badge-error {
    background: var(--error-light);
    border-color: var(--error-color);
  }

  .spinner {
    width: 10px;
    height: 10px;
    border: 2px solid var(--border-color);
    border-top: 2px solid var(--primary-color);
    border-radius: 50%;
    animation: spin 1s linear infinite;
  }

  @keyframes spin {
    0% { transform: rotate(0deg); }
    100% { transform: rotate(360deg); }
  }
`;
