/**
 * Page entry: defines the shell components
 */

import './components/index.js';
