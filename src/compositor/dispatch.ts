/**
 * Render a {@link DispatchCommand} as a Hyprland `dispatch` request body.
 *
 * @module compositor/dispatch
 */

import type { DispatchCommand } from './types.js';

export function formatDispatch(command: DispatchCommand): string {
  switch (command.type) {
    case 'switch-workspace':
      return `workspace ${command.workspace}`;
    case 'rename-workspace':
      return `renameworkspace ${command.workspace} ${command.name}`;
    case 'focus-window':
      return `focuswindow address:${command.address}`;
    case 'move-to-workspace':
      return `movetoworkspacesilent ${command.workspace},address:${command.address}`;
    case 'move-window':
      return `movewindowpixel exact ${command.x} ${command.y},address:${command.address}`;
    case 'resize-window':
      return `resizewindowpixel exact ${command.width} ${command.height},address:${command.address}`;
    case 'toggle-floating':
      return `togglefloating address:${command.address}`;
    case 'fullscreen':
      return 'fullscreen 0';
    case 'pin':
      return `pin address:${command.address}`;
    case 'exec':
      return command.workspace === undefined
        ? `exec ${command.command}`
        : `exec [workspace ${command.workspace} silent] ${command.command}`;
  }
}
