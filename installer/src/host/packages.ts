/**
 * Debian packages the kiosk needs: an X server with generic video drivers,
 * Openbox plus LightDM for the session, audio, and the native libraries
 * Electron links against.
 */
export const APT_PACKAGES = Object.freeze([
  "curl",
  "xorg",
  "xserver-xorg-video-all",
  "openbox",
  "obconf",
  "lightdm",
  "lightdm-gtk-greeter",
  "xinit",
  "x11-xserver-utils",
  "unclutter-xfixes",
  "pulseaudio",
  "alsa-utils",
  "build-essential",
  "python3",
  "pkg-config",
  "libgtk-3-dev",
  "libnss3",
  "libgbm1",
  "libasound2t64"
] as const);

export function nodeSourceSetupUrl(nodeMajor: number): string {
  return `https://deb.nodesource.com/setup_${nodeMajor}.x`;
}
