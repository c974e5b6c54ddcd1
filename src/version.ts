// TempleCode version.
// © Reuben Thomas 2023-2025
// Released under the GPL version 3, or (at your option) any later version.

export default '0.1.0'
