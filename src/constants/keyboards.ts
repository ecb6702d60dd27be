/**
 * Keyboard layouts used to build the adjacency graphs.
 *
 * Slanted layouts are typed row by row with each row shifted half a key to
 * the right of the one above; every key token lists its unshifted character
 * first. Keypads are aligned grids of single-character keys.
 */

export const QWERTY_LAYOUT = `
\`~ 1! 2@ 3# 4$ 5% 6^ 7& 8* 9( 0) -_ =+
    qQ wW eE rR tT yY uU iI oO pP [{ ]} \\|
     aA sS dD fF gG hH jJ kK lL ;: '"
      zZ xX cC vV bB nN mM ,< .> /?
`;

export const DVORAK_LAYOUT = `
\`~ 1! 2@ 3# 4$ 5% 6^ 7& 8* 9( 0) [{ ]}
    '" ,< .> pP yY fF gG cC rR lL /? =+ \\|
     aA oO eE uU iI dD hH tT nN sS -_
      ;: qQ jJ kK xX bB mM wW vV zZ
`;

export const KEYPAD_LAYOUT = `
  / * -
7 8 9 +
4 5 6
1 2 3
  0 .
`;

export const MAC_KEYPAD_LAYOUT = `
  = / *
7 8 9 -
4 5 6 +
1 2 3
  0 .
`;

/**
 * Characters typed with shift held on the keyboard layouts.
 */
export const SHIFTED_CHARS_PATTERN = /[~!@#$%^&*()_+QWERTYUIOP{}|ASDFGHJKL:"ZXCVBNM<>?]/;
