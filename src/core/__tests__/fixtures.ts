export const CORE_NS = 'http://schemas.microsoft.com/3dmanufacturing/core/2015/02'
export const MATERIAL_NS = 'http://schemas.microsoft.com/3dmanufacturing/material/2015/02'

/** A model part whose `<resources>` holds `resources`; `head` goes before it. */
export function model(resources: string, head = ''): string {
  return `<?xml version="1.0" encoding="UTF-8"?>
<model unit="millimeter" xml:lang="en-US" xmlns="${CORE_NS}" xmlns:m="${MATERIAL_NS}">
  ${head}
  <resources>
    ${resources}
  </resources>
  <build/>
</model>`
}

/** One triangle over (0,0,0) (1,0,0) (0,1,0); `triangles` replaces the default `<triangle>`. */
export function mesh(triangles = '<triangle v1="0" v2="1" v3="2"/>'): string {
  return `<mesh>
    <vertices>
      <vertex x="0" y="0" z="0"/>
      <vertex x="1" y="0" z="0"/>
      <vertex x="0" y="1" z="0"/>
    </vertices>
    <triangles>${triangles}</triangles>
  </mesh>`
}
