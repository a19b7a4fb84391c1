export { FileList } from './FileList.js';
export { NavigatorApp } from './NavigatorApp.js';
export { PreviewPane } from './PreviewPane.js';
export { StatusBar } from './StatusBar.js';
